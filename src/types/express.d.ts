import type { ContextFields, SharedLogger } from '@makerspace/shared';

declare global {
  namespace Express {
    // eslint-disable-next-line @typescript-eslint/consistent-type-definitions
    interface Locals {
      requesterId?: string;
      logger?: SharedLogger;
      logContext?: ContextFields;
    }
  }
}

export {};
