import type {OpenAPIV3} from 'openapi-types'

import {ADMIN_ROUTES, type AdminRouteDefinition} from './routes'

const booleanFlag = (description: string): OpenAPIV3.SchemaObject => ({
  type: 'boolean',
  description,
  example: true
})

const componentSchemas: Record<string, OpenAPIV3.SchemaObject> = {
  AdminStatusLiveness: {
    type: 'object',
    required: ['alive'],
    additionalProperties: false,
    properties: {
      alive: booleanFlag('Liveliness status')
    }
  },
  AdminStatusReadiness: {
    type: 'object',
    required: ['ready'],
    additionalProperties: false,
    properties: {
      ready: booleanFlag('Readiness status')
    }
  },
  AdminReset: {
    type: 'object',
    additionalProperties: false,
    properties: {}
  },
  AdminError: {
    type: 'object',
    required: ['error', 'reason', 'correlation_id'],
    properties: {
      error: {type: 'string', description: 'Stable error code.'},
      reason: {type: 'string', description: 'Short human-readable reason.'},
      correlation_id: {type: 'string', maxLength: 128}
    }
  }
}

const toResponses = (route: AdminRouteDefinition): OpenAPIV3.ResponsesObject => {
  const responses: OpenAPIV3.ResponsesObject = {}
  for (const [status, response] of Object.entries(route.responses)) {
    const responseObject: OpenAPIV3.ResponseObject = {description: response.description}
    if (response.schemaName) {
      responseObject.content = {
        'application/json': {schema: {$ref: `#/components/schemas/${response.schemaName}`}}
      }
    }
    if (response.redirect) {
      responseObject.headers = {Location: {schema: {type: 'string'}}}
    }
    responses[status] = responseObject
  }

  return responses
}

const toOperation = (route: AdminRouteDefinition): OpenAPIV3.OperationObject => ({
  tags: [route.tag],
  summary: route.summary,
  responses: toResponses(route)
})

export const buildOpenApiDocument = ({
  title,
  version,
  routes = Object.values(ADMIN_ROUTES)
}: {
  title: string
  version: string
  routes?: readonly AdminRouteDefinition[]
}): OpenAPIV3.Document => {
  const paths: OpenAPIV3.PathsObject = {}
  for (const route of routes) {
    const pathItem: OpenAPIV3.PathItemObject = {...paths[route.path]}
    if (route.method === 'get') {
      pathItem.get = toOperation(route)
    } else {
      pathItem.post = toOperation(route)
    }
    paths[route.path] = pathItem
  }

  return {
    openapi: '3.0.3',
    info: {
      title,
      version: `v${version}`
    },
    tags: [{name: 'server', description: 'Admin server status and statistics'}],
    paths,
    components: {
      schemas: componentSchemas,
      securitySchemes: {
        AdminApiKey: {
          type: 'apiKey',
          in: 'header',
          name: 'x-api-key'
        }
      }
    },
    security: [{AdminApiKey: []}]
  }
}
