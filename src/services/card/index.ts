export { CardService, maskCard } from './card.service';
export type { MaskedCard, CardServiceOptions } from './card.service';
export { CardCipher, generateCardNumber, generateCvv } from './card.crypto';
export { CardController } from './card.controller';
export { createCardRoutes } from './card.routes';
