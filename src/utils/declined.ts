import { Response } from 'express';

import { getCorrelationId } from '../observability';
import { DeclinedResponse, ErrorCode, errorCodeToStatus } from '../types/errors';

/**
 * Render a committed business decline: 422 with the declined rows in data
 */
export const sendDeclined = <T>(res: Response, message: string, data: T): void => {
  const body: DeclinedResponse<T> = {
    success: false,
    error: {
      code: ErrorCode.INSUFFICIENT_FUNDS,
      message,
      timestamp: new Date().toISOString(),
      correlationId: getCorrelationId() || 'unknown',
    },
    data,
  };
  res.status(errorCodeToStatus[ErrorCode.INSUFFICIENT_FUNDS]).json(body);
};
