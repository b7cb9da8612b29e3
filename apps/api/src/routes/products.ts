import { Router } from 'express'
import type { Request, Response, NextFunction } from 'express'
import { z } from 'zod'
import { limitParam, pageParam } from '../lib/paging'
import { listProducts } from '../services/product-listing'
import type { ListingDependencies } from '../services/product-listing'

/**
 * Plain catalog listing
 * GET /api/products?minPrice=20&maxPrice=80&page=1&limit=25
 */
const listingSchema = z
  .object({
    minPrice: z.coerce.number().min(0).optional(),
    maxPrice: z.coerce.number().min(0).optional(),
    page: pageParam,
    limit: limitParam,
  })
  .refine((q) => q.minPrice === undefined || q.maxPrice === undefined || q.minPrice <= q.maxPrice, {
    message: 'minPrice must not exceed maxPrice',
    path: ['minPrice'],
  })

export function createProductsRouter(deps: ListingDependencies): Router {
  const router = Router()

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = listingSchema.parse(req.query)
      const result = await listProducts(
        {
          minPrice: params.minPrice ?? null,
          maxPrice: params.maxPrice ?? null,
          page: params.page,
          limit: params.limit,
        },
        deps
      )
      res.json(result)
    } catch (error) {
      next(error)
    }
  })

  return router
}
