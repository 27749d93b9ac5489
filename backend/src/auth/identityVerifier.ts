import { OAuth2Client } from 'google-auth-library';
import { UnauthorizedError, errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { UserProfile } from '../services/UserService.js';

const authLog = createLogger(NAMESPACES.server.auth);

/** Turns an identity-provider credential into a verified profile. */
export interface IdentityVerifier {
  verify(credential: string): Promise<UserProfile>;
}

export class GoogleIdentityVerifier implements IdentityVerifier {
  private readonly client: OAuth2Client;

  constructor(private readonly clientId: string) {
    this.client = new OAuth2Client(clientId || undefined);
  }

  async verify(credential: string): Promise<UserProfile> {
    let email: string | undefined;
    let name: string | undefined;
    let picture: string | undefined;
    try {
      const ticket = await this.client.verifyIdToken({
        idToken: credential,
        ...(this.clientId ? { audience: this.clientId } : {})
      });
      const payload = ticket.getPayload();
      email = payload?.email;
      name = payload?.name;
      picture = payload?.picture;
    } catch (error) {
      authLog('Google token verification failed: %s', errorMessage(error));
      throw new UnauthorizedError('Invalid Google token');
    }
    if (!email) {
      throw new UnauthorizedError('Invalid Google token');
    }
    return { email, name, avatarUrl: picture };
  }
}
