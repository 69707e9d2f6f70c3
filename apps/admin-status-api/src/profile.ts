import type {IncomingMessage} from 'node:http'

export type AdminProfile = {
  name: string
  settings: Readonly<Record<string, unknown>>
}

export class AdminRequestContext {
  public constructor(public readonly profile: AdminProfile) {}
}

const requestContexts = new WeakMap<IncomingMessage, AdminRequestContext>()

export const attachAdminRequestContext = (request: IncomingMessage, context: AdminRequestContext) => {
  requestContexts.set(request, context)
}

export const getAdminRequestContext = (request: IncomingMessage): AdminRequestContext | undefined =>
  requestContexts.get(request)
