import {describe, expect, it} from 'vitest'

import {
  AdminErrorSchema,
  AdminResetSchema,
  AdminStatusLivenessSchema,
  AdminStatusReadinessSchema,
  LogEventSchema
} from '../index'

describe('@credential-agent/schemas', () => {
  it('accepts a complete log envelope and rejects unknown keys', () => {
    const envelope = {
      ts: '2026-01-01T00:00:00.000Z',
      level: 'info',
      service: 'admin-status-api',
      env: 'test',
      event: 'request.completed',
      component: 'http.server',
      correlation_id: 'corr_1',
      request_id: 'req_1',
      status_code: 200,
      metadata: {}
    }

    expect(LogEventSchema.parse(envelope)).toEqual(envelope)
    expect(LogEventSchema.safeParse({...envelope, workload: 'w_1'}).success).toBe(false)
    expect(LogEventSchema.safeParse({...envelope, status_code: 700}).success).toBe(false)
  })

  it('requires error code, reason and correlation id on admin errors', () => {
    expect(
      AdminErrorSchema.parse({error: 'admin_auth_invalid', reason: 'Unauthorized', correlation_id: 'corr_1'})
    ).toEqual({error: 'admin_auth_invalid', reason: 'Unauthorized', correlation_id: 'corr_1'})
    expect(AdminErrorSchema.safeParse({error: 'x', reason: '', correlation_id: 'corr_1'}).success).toBe(false)
  })

  it('keeps status payloads strict', () => {
    expect(AdminStatusLivenessSchema.parse({alive: true})).toEqual({alive: true})
    expect(AdminStatusReadinessSchema.parse({ready: false})).toEqual({ready: false})
    expect(AdminResetSchema.parse({})).toEqual({})
    expect(AdminResetSchema.safeParse({reset: true}).success).toBe(false)
  })
})
