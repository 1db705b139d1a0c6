export { StatementService } from './statement.service';
export { StatementController } from './statement.controller';
export { createStatementRoutes } from './statement.routes';
