/**
 * JWT Owner Guard
 * Validates the Bearer JWT and exposes its `sub` claim as the owner of the webhook resources.
 */

import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Request } from 'express';

export interface AuthenticatedOwner {
  sub: string;
  email?: string;
}

export type OwnerRequest = Request & { owner?: AuthenticatedOwner };

@Injectable()
export class JwtOwnerGuard implements CanActivate {
  constructor(private readonly jwtService: JwtService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<OwnerRequest>();
    const authHeader = request.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedException('Missing or invalid Authorization header');
    }

    const token = authHeader.slice(7);
    let payload: { sub?: unknown; email?: unknown };
    try {
      payload = await this.jwtService.verifyAsync<{ sub?: unknown; email?: unknown }>(token);
    } catch {
      throw new UnauthorizedException('Invalid token');
    }

    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      throw new UnauthorizedException('Token has no subject');
    }

    request.owner = {
      sub: payload.sub,
      email: typeof payload.email === 'string' ? payload.email : undefined,
    };
    return true;
  }
}
