import { MailBackend } from './backend';

export type MailBackendFactory = () => Promise<MailBackend>;

/**
 * Creates the mail backend on first use and shares it afterwards. Concurrent
 * callers wait on the same creation; a failed creation is forgotten so the
 * next call tries again.
 */
export class MailBackendProvider {
  private pending: Promise<MailBackend> | null = null;

  constructor(private factory: MailBackendFactory) {}

  get(): Promise<MailBackend> {
    if (!this.pending) {
      this.pending = this.factory().catch(error => {
        this.pending = null;
        throw error;
      });
    }
    return this.pending;
  }
}
