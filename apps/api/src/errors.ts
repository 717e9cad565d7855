import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { EngineError } from '@loan-amort/engine';

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: ContentfulStatusCode = 400,
    public suggestion = '',
  ) {
    super(message);
  }
}

export const notFound = (entity: string, id: string) =>
  new AppError(
    'NOT_FOUND',
    `${entity} '${id}' not found`,
    404,
    `Use GET /api/v1/${entity.toLowerCase()}s to list available IDs`,
  );

export const validationError = (message: string) =>
  new AppError('VALIDATION_ERROR', message, 400, 'Check request body');

export function fromEngineError(error: EngineError): AppError {
  switch (error.kind) {
    case 'InvalidMonth':
      return new AppError('INVALID_MONTH', error.message, 400, 'Pass a month between 0 and the loan term');
    case 'InvalidLoanParameters':
      return new AppError('INVALID_LOAN_PARAMETERS', error.message, 400, 'Check the loan principal, rate and term');
  }
}
