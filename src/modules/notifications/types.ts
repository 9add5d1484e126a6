import type { CanonicalToken, StatusTransition } from '../../types/index.js';

/**
 * Downstream consumer of pipeline events. The merge engine never awaits
 * these; a rejected promise is logged and dropped.
 */
export interface NotificationSink {
  onNewToken(token: CanonicalToken): Promise<void>;
  onStatusChange(token: CanonicalToken, transition: StatusTransition): Promise<void>;
  onBlacklist(token: CanonicalToken, reason: string): Promise<void>;
}
