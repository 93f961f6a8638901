import { InternalServerErrorException } from '@nestjs/common';

export class TransactionFailedException extends InternalServerErrorException {
  constructor(operation: string, cause: unknown) {
    super(`Transaction failed during ${operation}; no changes were applied.`, { cause });
  }
}
