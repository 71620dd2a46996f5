import { ExecutionContext, ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { JwtService } from '@nestjs/jwt';
import { JwtRolesGuard } from './jwt-roles.guard';
import { AllowOwner, Public, Roles } from './roles.decorator';

class RoutesUnderTest {
  @Public()
  open(): void {}

  adminOnly(): void {}

  @Roles('ops:reader')
  reader(): void {}

  @AllowOwner('userId')
  ownInbox(): void {}
}

interface FakeRequest {
  headers: { authorization?: string };
  params: Record<string, string>;
  user?: unknown;
}

describe('JwtRolesGuard', () => {
  const jwtService = new JwtService({ secret: 'test-secret' });
  const guard = new JwtRolesGuard(
    new Reflector(),
    jwtService,
    new ConfigService({ serviceName: 'notifications-service' }),
  );

  function contextFor(handler: () => void, request: FakeRequest): ExecutionContext {
    return {
      getHandler: () => handler,
      getClass: () => RoutesUnderTest,
      switchToHttp: () => ({ getRequest: () => request }),
    } as unknown as ExecutionContext;
  }

  function bearer(payload: { sub: string; roles?: string[] }): FakeRequest['headers'] {
    return { authorization: `Bearer ${jwtService.sign(payload)}` };
  }

  const routes = RoutesUnderTest.prototype;

  it('lets public routes through without a token', () => {
    expect(guard.canActivate(contextFor(routes.open, { headers: {}, params: {} }))).toBe(true);
  });

  it('rejects a missing or malformed token', () => {
    expect(() => guard.canActivate(contextFor(routes.adminOnly, { headers: {}, params: {} }))).toThrow(
      UnauthorizedException,
    );
    expect(() =>
      guard.canActivate(contextFor(routes.adminOnly, { headers: { authorization: 'Bearer nope' }, params: {} })),
    ).toThrow('Invalid token');
  });

  it('requires a default admin role when the route names none', () => {
    const admin: FakeRequest = {
      headers: bearer({ sub: 'user-9', roles: ['internal:notifications-service:admin'] }),
      params: {},
    };

    expect(guard.canActivate(contextFor(routes.adminOnly, admin))).toBe(true);
    expect(admin.user).toEqual({ sub: 'user-9', email: undefined, roles: ['internal:notifications-service:admin'] });
    expect(() =>
      guard.canActivate(contextFor(routes.adminOnly, { headers: bearer({ sub: 'user-9' }), params: {} })),
    ).toThrow(ForbiddenException);
  });

  it('accepts any of the roles named on the route', () => {
    const request: FakeRequest = { headers: bearer({ sub: 'user-9', roles: ['ops:reader'] }), params: {} };

    expect(guard.canActivate(contextFor(routes.reader, request))).toBe(true);
  });

  it('lets the owner of the route parameter through', () => {
    const own: FakeRequest = { headers: bearer({ sub: 'user-1' }), params: { userId: 'user-1' } };
    const other: FakeRequest = { headers: bearer({ sub: 'user-2' }), params: { userId: 'user-1' } };

    expect(guard.canActivate(contextFor(routes.ownInbox, own))).toBe(true);
    expect(() => guard.canActivate(contextFor(routes.ownInbox, other))).toThrow('Insufficient permissions');
  });
});
