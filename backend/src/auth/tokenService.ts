import jwt from 'jsonwebtoken';
import { AuthSettings } from '../configManager.js';
import { UnauthorizedError } from '../errors.js';

const SECONDS_PER_DAY = 24 * 60 * 60;

/** HS256 bearer tokens carrying the local user id. */
export class TokenService {
  constructor(private readonly settings: Pick<AuthSettings, 'jwtSecret' | 'tokenTtlDays'>) {}

  issue(userId: string): string {
    return jwt.sign({ user_id: userId }, this.settings.jwtSecret, {
      algorithm: 'HS256',
      expiresIn: Math.round(this.settings.tokenTtlDays * SECONDS_PER_DAY)
    });
  }

  /** The user id inside a valid token; UnauthorizedError otherwise. */
  verify(token: string): string {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.settings.jwtSecret, { algorithms: ['HS256'] });
    } catch {
      throw new UnauthorizedError('Invalid or expired session');
    }
    const userId: unknown = typeof payload === 'string' ? undefined : payload.user_id;
    if (typeof userId !== 'string' || !userId) {
      throw new UnauthorizedError('Invalid or expired session');
    }
    return userId;
  }
}

export default TokenService;
