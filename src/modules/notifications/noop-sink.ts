import type { NotificationSink } from './types.js';

export class NoopSink implements NotificationSink {
  async onNewToken(): Promise<void> {}
  async onStatusChange(): Promise<void> {}
  async onBlacklist(): Promise<void> {}
}
