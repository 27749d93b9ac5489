import { User, UserService } from '../services/UserService.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { UnauthorizedError } from '../errors.js';
import { IdentityVerifier } from './identityVerifier.js';
import { TokenService } from './tokenService.js';

const authLog = createLogger(NAMESPACES.server.auth);

export interface LoginResult {
  token: string;
  user: User;
}

export class LoginService {
  constructor(
    private readonly verifier: IdentityVerifier,
    private readonly users: UserService,
    private readonly tokens: TokenService
  ) {}

  async login(credential: string): Promise<LoginResult> {
    const profile = await this.verifier.verify(credential);
    const user = this.users.upsertByEmail(profile);
    authLog('User %s logged in', user.id);
    return { token: this.tokens.issue(user.id), user };
  }

  /** Resolve a bearer token to the user it was issued for. */
  authenticate(token: string): string {
    const userId = this.tokens.verify(token);
    if (!this.users.getById(userId)) {
      throw new UnauthorizedError('Unknown user');
    }
    return userId;
  }
}

export default LoginService;
