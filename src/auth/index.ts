export { AuthService, toPublicUser } from './auth.service';
export { createAuthMiddleware, requireRole, requireMember, holderIdOf } from './auth.middleware';
export { AuthController } from './auth.controller';
export * from './auth.types';
export { createAuthRoutes } from './auth.routes';
