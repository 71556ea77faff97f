import { Router } from 'express';
import { z } from 'zod';
import type { HubContext } from '../services/context';
import { ApiError, handle } from './apiError';

const NewProductSchema = z.object({
  productId: z.string().trim().min(1),
  productName: z.string().trim().min(1),
  productLength: z.number().positive(),
  description: z.string().nullable().optional(),
  shelfId: z.string().trim().min(1).nullable().optional(),
  stockQuantity: z.number().int().nonnegative().optional(),
});

export function createProductsRouter({ store }: Pick<HubContext, 'store'>): Router {
  const router = Router();

  router.get('/', handle((_req, res) => res.json(store.listProducts())));

  router.get('/summary', handle((_req, res) => res.json(store.stockSummary())));

  router.post(
    '/',
    handle((req, res) => {
      const input = NewProductSchema.parse(req.body);
      return res.status(201).json(store.addProduct(input));
    }),
  );

  router.delete(
    '/:id',
    handle((req, res) => {
      if (!store.deleteProduct(req.params.id)) {
        throw new ApiError(404, 'PRODUCT_NOT_FOUND', `Product ${req.params.id} not found`);
      }
      return res.json({ success: true });
    }),
  );

  return router;
}
