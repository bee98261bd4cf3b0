import { randomUUID } from 'crypto';
import { asSessionId, type SessionId } from '../../../domain/workflow/ids.js';
import type { IdFactoryPort } from '../../../ports/id-factory.port.js';

/**
 * UUID v4 session ids; they match SESSION_ID_PATTERN by construction.
 */
export class RandomIdFactory implements IdFactoryPort {
  mintSessionId(): SessionId {
    return asSessionId(randomUUID());
  }
}
