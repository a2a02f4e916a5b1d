import { createParamDecorator } from '@nestjs/common'

import { getVerifiedClaims } from '../utils/request-context'

import type { ExecutionContext } from '@nestjs/common'

/**
 * @summary Inject the claims verified by {@link JwtAuthGuard}, or a single claim by name.
 * @remarks Used on a route without the guard it fails with 500.
 */
export const VerifiedClaims = createParamDecorator(
  (claim: string | undefined, ctx: ExecutionContext): unknown => {
    const claims = getVerifiedClaims(ctx.switchToHttp().getRequest<object>())
    return claim ? claims[claim] : claims
  },
)
