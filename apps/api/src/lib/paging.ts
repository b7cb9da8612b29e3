import { z } from 'zod'

/** Deepest page served; keeps `(page - 1) * limit` a small integer */
export const MAX_PAGE = 1000
export const MAX_LIMIT = 100

export const pageParam = z.coerce.number().int().positive().max(MAX_PAGE).default(1)
export const limitParam = z.coerce.number().int().min(1).max(MAX_LIMIT).default(25)
