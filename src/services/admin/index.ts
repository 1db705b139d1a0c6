export { AdminController } from './admin.controller';
export { createAdminRoutes } from './admin.routes';
