/**
 * Access metadata for JwtRolesGuard.
 * Roles use OR logic: global:superadmin, internal:<SERVICE_NAME>:admin, etc.
 */

import { SetMetadata } from '@nestjs/common';

export const ROLES_KEY = 'roles';
export const PUBLIC_KEY = 'public';
export const OWNER_PARAM_KEY = 'ownerParam';

export const Public = () => SetMetadata(PUBLIC_KEY, true);

export const Roles = (...roles: string[]) => SetMetadata(ROLES_KEY, { roles });

/** Lets the token subject through when it equals the named route parameter. */
export const AllowOwner = (param: string) => SetMetadata(OWNER_PARAM_KEY, param);
