import {
  HttpStatus,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common'

import { describeError } from '../errors/auth.error'
import { toHttpException } from '../errors/http-error'
import { JWKS_AUTH_OPTIONS } from '../module/jwks-auth.constants'
import { TokenVerificationService } from '../services/token-verification.service'
import { attachVerifiedClaims, extractBearerToken } from '../utils/request-context'

import type { ResolvedJwksAuthOptions } from '../config/jwks-auth.options'
import type { ErrorBody } from '../errors/http-error'
import type { Claims } from '../types/claims'
import type { BearerRequest } from '../utils/request-context'
import type { CanActivate, ExecutionContext } from '@nestjs/common'

/**
 * @summary Route guard authenticating `Authorization: Bearer` JWTs.
 * @remarks
 * Requests without a bearer credential are rejected with 401 before verification.
 * Verified claims are attached to the request and read back with
 * {@link VerifiedClaims}. Failures become `{ "error": message }` responses whose status
 * follows the {@link AuthErrorCode}.
 * @example
 * ```ts
 * @Controller('orders')
 * @UseGuards(JwtAuthGuard)
 * export class OrdersController {
 *   @Get()
 *   list(@VerifiedClaims('sub') subject: string) {}
 * }
 * ```
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name)

  constructor(
    private readonly verifier: TokenVerificationService,
    @Inject(JWKS_AUTH_OPTIONS) private readonly options: ResolvedJwksAuthOptions,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<BearerRequest>()
    const token = extractBearerToken(request)
    if (!token) {
      throw new UnauthorizedException({ error: 'Missing bearer token' } satisfies ErrorBody)
    }

    let claims: Claims
    try {
      claims = await this.verifier.verify(token)
    } catch (error) {
      const exception = toHttpException(error, this.options.redactServerErrors)
      if (exception.getStatus() >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`Token verification failed: ${describeError(error)}`)
      }
      throw exception
    }

    attachVerifiedClaims(request, claims)
    return true
  }
}
