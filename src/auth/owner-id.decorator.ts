/**
 * Owner id of the authenticated caller. Use on routes behind JwtOwnerGuard.
 */

import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { OwnerRequest } from './jwt-owner.guard';

export function ownerIdFromRequest(request: OwnerRequest): string {
  if (!request.owner) {
    throw new UnauthorizedException('Not authenticated');
  }
  return request.owner.sub;
}

export const OwnerId = createParamDecorator((_data: unknown, ctx: ExecutionContext): string =>
  ownerIdFromRequest(ctx.switchToHttp().getRequest<OwnerRequest>()),
);
