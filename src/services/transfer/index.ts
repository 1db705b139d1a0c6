export { TransferService } from './transfer.service';
export type { TransferDTO } from './transfer.service';
export { TransferController } from './transfer.controller';
export { createTransferRoutes } from './transfer.routes';
