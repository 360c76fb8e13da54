import type { PlatformCredentials } from './types.js';
import type { PlatformClient, PlatformClientOptions } from './platform-client.js';
import { DevToClient } from './devto-client.js';
import { MediumClient } from './medium-client.js';
import { validateCredential } from './sanitizer.js';
import { fail, ok, type Result } from './result.js';

/**
 * Build a platform client after rejecting empty or template credentials
 */
export function createPlatformClient(
  credentials: PlatformCredentials,
  options: PlatformClientOptions = {}
): Result<PlatformClient> {
  switch (credentials.platform) {
    case 'devto': {
      const apiKey = validateCredential('devto', 'api_key', credentials.apiKey);
      if (!apiKey.success) return fail(apiKey.error);
      return ok(new DevToClient({ apiKey: apiKey.data }, options));
    }
    case 'medium': {
      const accessToken = validateCredential('medium', 'access_token', credentials.accessToken);
      if (!accessToken.success) return fail(accessToken.error);
      return ok(new MediumClient({ accessToken: accessToken.data }, options));
    }
  }
}
