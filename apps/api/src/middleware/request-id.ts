import type { Context, Next } from 'hono'
import { generateId } from '@layerfarm/db'

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
  }
}

const CALLER_ID = /^[A-Za-z0-9._:-]{1,128}$/

/**
 * Tags every request with an id, echoed in `x-request-id` and in the
 * envelope `meta`. A caller's id is kept when it is a plain token;
 * otherwise a `req_` KSUID is minted.
 */
export async function requestId(c: Context, next: Next) {
  const incoming = c.req.header('x-request-id')
  const id = incoming && CALLER_ID.test(incoming) ? incoming : generateId('req')
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}
