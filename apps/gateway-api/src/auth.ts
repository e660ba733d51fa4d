import {CallerIdSchema} from '@prefab-gateway/schemas'
import {jwtVerify} from 'jose'
import {z} from 'zod'

import {forbidden, unauthorized} from './errors'

export const gatewayScopes = ['prefab:execute', 'prefab:read', 'secrets:manage', 'admin'] as const
export type GatewayScope = (typeof gatewayScopes)[number]

export type CallerPrincipal = {
  callerId: string
  username?: string
  scopes: string[]
}

const TokenClaimsSchema = z.object({
  sub: CallerIdSchema,
  username: z.string().min(1).optional(),
  scopes: z
    .union([z.array(z.string()), z.string()])
    .optional()
    .transform(value => (typeof value === 'string' ? value.split(' ') : (value ?? [])).filter(scope => scope.length > 0))
})

export type TokenVerifierOptions = {
  secret: Uint8Array
  audience: string
  issuer?: string
}

const extractBearerToken = (authorizationHeader: string | undefined) => {
  if (!authorizationHeader) {
    throw unauthorized('unauthenticated', 'Missing bearer token')
  }

  const [scheme, token, ...rest] = authorizationHeader.trim().split(/\s+/u)
  if (scheme?.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    throw unauthorized('unauthenticated', 'Authorization header must be a bearer token')
  }

  return token
}

export const createTokenVerifier =
  ({secret, audience, issuer}: TokenVerifierOptions) =>
  async (authorizationHeader: string | undefined): Promise<CallerPrincipal> => {
    const token = extractBearerToken(authorizationHeader)

    let payload: unknown
    try {
      const verified = await jwtVerify(token, secret, {
        algorithms: ['HS256'],
        audience,
        ...(issuer ? {issuer} : {})
      })
      payload = verified.payload
    } catch {
      throw unauthorized('unauthenticated', 'Bearer token is invalid or expired')
    }

    const claims = TokenClaimsSchema.safeParse(payload)
    if (!claims.success) {
      throw unauthorized('unauthenticated', 'Bearer token claims are invalid')
    }

    return {
      callerId: claims.data.sub,
      ...(claims.data.username ? {username: claims.data.username} : {}),
      scopes: claims.data.scopes
    }
  }

export type TokenVerifier = ReturnType<typeof createTokenVerifier>

export const hasScope = ({principal, scope}: {principal: CallerPrincipal; scope: GatewayScope}) =>
  principal.scopes.includes('admin') || principal.scopes.includes(scope)

export const requireScope = ({principal, scope}: {principal: CallerPrincipal; scope: GatewayScope}) => {
  if (!hasScope({principal, scope})) {
    throw forbidden('permission_denied', `Token lacks the ${scope} scope`)
  }
}
