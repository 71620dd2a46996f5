/**
 * JWT Roles Guard
 * Validates the Bearer JWT and enforces roles from payload.roles, or route ownership via @AllowOwner.
 */

import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  ForbiddenException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { Request } from 'express';
import { ROLES_KEY, PUBLIC_KEY, OWNER_PARAM_KEY } from './roles.decorator';

interface TokenPayload {
  sub?: string;
  email?: string;
  roles?: string[];
}

export interface AuthenticatedUser {
  sub: string;
  email?: string;
  roles: string[];
}

@Injectable()
export class JwtRolesGuard implements CanActivate {
  constructor(
    private reflector: Reflector,
    private jwtService: JwtService,
    private config: ConfigService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const targets = [context.getHandler(), context.getClass()];
    const isPublic = this.reflector.getAllAndOverride<boolean>(PUBLIC_KEY, targets);
    if (isPublic) return true;

    const rolesMetadata = this.reflector.getAllAndOverride<{ roles: string[] } | undefined>(ROLES_KEY, targets);
    const requiredRoles = rolesMetadata?.roles?.length ? rolesMetadata.roles : this.getDefaultRoles();
    const ownerParam = this.reflector.getAllAndOverride<string | undefined>(OWNER_PARAM_KEY, targets);

    const request = context.switchToHttp().getRequest<Request & { user?: AuthenticatedUser }>();
    const authHeader = request.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedException('Missing or invalid Authorization header');
    }

    let payload: TokenPayload;
    try {
      payload = this.jwtService.verify<TokenPayload>(authHeader.slice(7));
    } catch {
      throw new UnauthorizedException('Invalid token');
    }
    if (!payload.sub) {
      throw new UnauthorizedException('Invalid token');
    }

    const userRoles: string[] = Array.isArray(payload.roles) ? payload.roles : [];
    const hasRole = requiredRoles.some((r) => userRoles.includes(r));
    const isOwner = ownerParam !== undefined && request.params[ownerParam] === payload.sub;
    if (!hasRole && !isOwner) {
      throw new ForbiddenException('Insufficient permissions');
    }

    request.user = {
      sub: payload.sub,
      email: payload.email,
      roles: userRoles,
    };
    return true;
  }

  private getDefaultRoles(): string[] {
    const name = this.config.get<string>('serviceName') ?? 'notifications-service';
    return ['global:superadmin', `internal:${name}:admin`];
  }
}
