export const ADMIN_STATUS_API_RUNTIME = Symbol('ADMIN_STATUS_API_RUNTIME')
