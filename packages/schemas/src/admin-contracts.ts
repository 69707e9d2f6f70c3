import {z} from 'zod'

export const AdminErrorSchema = z
  .object({
    error: z.string().min(1),
    reason: z.string().min(1),
    correlation_id: z.string().min(1).max(128)
  })
  .strict()

export type AdminError = z.infer<typeof AdminErrorSchema>

export const AdminStatusLivenessSchema = z
  .object({
    alive: z.boolean()
  })
  .strict()

export type AdminStatusLiveness = z.infer<typeof AdminStatusLivenessSchema>

export const AdminStatusReadinessSchema = z
  .object({
    ready: z.boolean()
  })
  .strict()

export type AdminStatusReadiness = z.infer<typeof AdminStatusReadinessSchema>

export const AdminResetSchema = z.object({}).strict()

export type AdminReset = z.infer<typeof AdminResetSchema>
