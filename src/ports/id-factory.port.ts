import type { SessionId } from '../domain/workflow/ids.js';

export interface IdFactoryPort {
  mintSessionId(): SessionId;
}
