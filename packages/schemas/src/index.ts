export {LogEventSchema, type LogEvent} from './log-contracts'
export {
  AdminErrorSchema,
  AdminResetSchema,
  AdminStatusLivenessSchema,
  AdminStatusReadinessSchema,
  type AdminError,
  type AdminReset,
  type AdminStatusLiveness,
  type AdminStatusReadiness
} from './admin-contracts'
