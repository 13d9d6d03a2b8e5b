import { Injectable, Inject } from '@nestjs/common';
import type { InboxModuleConfig } from '../inbox.config';
import { DEFAULT_SIGNATURE_HEADER, INBOX_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to inbox configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(INBOX_CONFIG)
    private readonly config: InboxModuleConfig,
  ) {}

  /**
   * Whether a webhook secret is set (empty strings count as unset)
   */
  isSecretConfigured(): boolean {
    return Boolean(this.config.webhook.secret);
  }

  /**
   * Signature header name, lowercased to match Node's header keys
   */
  getSignatureHeader(): string {
    return (
      this.config.webhook.signatureHeader || DEFAULT_SIGNATURE_HEADER
    ).toLowerCase();
  }
}
