export type AdminRouteMethod = 'get' | 'post'

export type AdminRouteResponse = {
  description: string
  schemaName?: 'AdminStatusLiveness' | 'AdminStatusReadiness' | 'AdminReset' | 'AdminError'
  redirect?: boolean
}

export type AdminRouteDefinition = {
  method: AdminRouteMethod
  path: string
  tag: string
  summary: string
  responses: Record<number, AdminRouteResponse>
}

const unauthorizedResponse: AdminRouteResponse = {
  description: 'Missing or invalid x-api-key header',
  schemaName: 'AdminError'
}

const headNotAllowedResponse: AdminRouteResponse = {
  description: 'HEAD is not served on this route',
  schemaName: 'AdminError'
}

/**
 * Every route registered by the admin status server. Controllers take their paths
 * from here and the OpenAPI document is built from the same table.
 */
export const ADMIN_ROUTES = {
  root: {
    method: 'get',
    path: '/',
    tag: 'server',
    summary: 'Redirect to the API documentation',
    responses: {
      302: {description: 'Redirect to /api/doc', redirect: true},
      401: unauthorizedResponse
    }
  },
  statusReset: {
    method: 'post',
    path: '/status/reset',
    tag: 'server',
    summary: 'Reset statistics',
    responses: {
      200: {description: 'Statistics reset', schemaName: 'AdminReset'},
      401: unauthorizedResponse,
      503: {description: 'Shutdown in progress', schemaName: 'AdminError'}
    }
  },
  liveness: {
    method: 'get',
    path: '/status/live',
    tag: 'server',
    summary: 'Liveliness check',
    responses: {
      200: {description: 'Server is alive', schemaName: 'AdminStatusLiveness'},
      401: unauthorizedResponse,
      405: headNotAllowedResponse,
      503: {description: 'Service not available', schemaName: 'AdminError'}
    }
  },
  readiness: {
    method: 'get',
    path: '/status/ready',
    tag: 'server',
    summary: 'Readiness check',
    responses: {
      200: {description: 'Server is ready', schemaName: 'AdminStatusReadiness'},
      401: unauthorizedResponse,
      405: headNotAllowedResponse,
      503: {description: 'Service not ready', schemaName: 'AdminError'}
    }
  }
} as const satisfies Record<string, AdminRouteDefinition>

export const DOCUMENTATION_PATHS = {
  ui: '/api/doc',
  document: '/api/docs/swagger.json'
} as const

export const toOperationName = (route: AdminRouteDefinition) => `${route.method.toUpperCase()} ${route.path}`
