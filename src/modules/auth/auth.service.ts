import type { PasswordHasher } from './password';
import type { TokenService } from './token.service';
import { InvalidTokenError } from './token.service';
import type { UserService } from '../users/users.service';
import type { PublicUser, User } from '../../connections/db/models/user.model';
import { toPublicUser } from '../../connections/db/models/user.model';
import type { Mailer } from '../../utils/email.service';
import type { TokenResponse } from '../../types/response.types';
import { BadRequestError, ConflictError, UnauthorizedError } from '../../utils/errors';
import { auditLog, getLogger } from '../../utils/logging';

const log = getLogger('auth');

export const AuthMessages = {
  emailTaken: 'User with this email already exists',
  usernameTaken: 'User with this username already exists',
  badCredentials: 'The username or password is incorrect',
  emailNotConfirmed: 'Email is not confirmed',
  verificationError: 'Verification error',
  alreadyConfirmed: 'Your email has been already confirmed',
  confirmed: 'Email confirmed successfully',
  checkEmail: 'Check your email for confirmation link',
} as const;

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
}

export interface AuthServiceDeps {
  users: UserService;
  hasher: PasswordHasher;
  tokens: TokenService;
  mailer: Mailer;
}

/**
 * Registration, login and the email-confirmation round trip.
 */
export class AuthService {
  private readonly users: UserService;
  private readonly hasher: PasswordHasher;
  private readonly tokens: TokenService;
  private readonly mailer: Mailer;

  constructor({ users, hasher, tokens, mailer }: AuthServiceDeps) {
    this.users = users;
    this.hasher = hasher;
    this.tokens = tokens;
    this.mailer = mailer;
  }

  /**
   * Email conflicts are reported before username conflicts. The
   * confirmation email goes out in the background.
   */
  async register(input: RegisterInput, baseUrl: string): Promise<PublicUser> {
    if (await this.users.getByEmail(input.email)) {
      log.warn('[Register] Email already registered', { email: input.email });
      throw new ConflictError(AuthMessages.emailTaken);
    }

    if (await this.users.getByUsername(input.username)) {
      log.warn('[Register] Username already taken', { username: input.username });
      throw new ConflictError(AuthMessages.usernameTaken);
    }

    const passwordHash = await this.hasher.hash(input.password);
    const user = await this.users.create({
      username: input.username,
      email: input.email,
      password_hash: passwordHash,
    });

    this.dispatchConfirmation(user, baseUrl);

    auditLog('USER_REGISTERED', { userId: user.id, username: user.username, email: user.email });
    return toPublicUser(user);
  }

  /**
   * Unknown user and wrong password share one message. The confirmation
   * check only runs once the credentials are proven.
   */
  async login(username: string, password: string): Promise<TokenResponse> {
    const user = await this.users.getByUsername(username);
    const valid = user !== null && (await this.hasher.verify(password, user.password_hash));

    if (!user || !valid) {
      log.warn('[Login] Invalid credentials', { username });
      throw new UnauthorizedError(AuthMessages.badCredentials);
    }

    if (!user.confirmed) {
      log.warn('[Login] Email not confirmed', { userId: user.id });
      throw new UnauthorizedError(AuthMessages.emailNotConfirmed);
    }

    auditLog('USER_LOGIN', { userId: user.id, username: user.username });

    return {
      access_token: this.tokens.issueSessionToken(user.username),
      token_type: 'bearer',
    };
  }

  async confirmEmail(token: string): Promise<string> {
    let email: string;
    try {
      email = this.tokens.verifyConfirmationToken(token).sub;
    } catch (error: unknown) {
      if (error instanceof InvalidTokenError) {
        log.warn('[ConfirmEmail] Rejected token', { reason: error.reason });
        throw new BadRequestError(error.message);
      }
      throw error;
    }

    const user = await this.users.getByEmail(email);
    if (!user) {
      throw new BadRequestError(AuthMessages.verificationError);
    }

    if (user.confirmed) {
      return AuthMessages.alreadyConfirmed;
    }

    await this.users.confirmEmail(user);
    auditLog('USER_CONFIRMED', { userId: user.id, email });
    return AuthMessages.confirmed;
  }

  /**
   * The reply for an unknown address is the same as for a pending one.
   */
  async requestEmail(email: string, baseUrl: string): Promise<string> {
    const user = await this.users.getByEmail(email);

    if (!user) {
      log.info('[RequestEmail] No account for address', { email });
      return AuthMessages.checkEmail;
    }

    if (user.confirmed) {
      return AuthMessages.alreadyConfirmed;
    }

    this.dispatchConfirmation(user, baseUrl);
    return AuthMessages.checkEmail;
  }

  /**
   * Fire-and-forget: the caller never waits on SMTP and never sees its failures.
   */
  private dispatchConfirmation(user: Pick<User, 'email' | 'username'>, baseUrl: string): void {
    const token = this.tokens.issueConfirmationToken(user.email);

    void this.mailer
      .sendConfirmationEmail({ email: user.email, username: user.username, token, baseUrl })
      .catch((error: unknown) => {
        log.error('[Mail] Confirmation email dispatch failed', {
          email: user.email,
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }
}
