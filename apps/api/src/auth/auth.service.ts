import { Injectable, Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { User } from '@contacts/database';
import { UsersService } from '../users/users.service';
import { UserResponseDto } from '../users/dto/user-response.dto';
import { MailService } from '../mail/mail.service';
import { TokenService } from './token.service';
import {
  SignupDto,
  LoginDto,
  AuthResponseDto,
  SignupResponseDto,
  MessageResponseDto,
} from './dto';
import {
  EmailAlreadyExistsException,
  EmailNotConfirmedException,
  EmailVerificationException,
  InvalidCredentialsException,
  InvalidRefreshTokenException,
} from './exceptions';

/** Number of bcrypt salt rounds */
const BCRYPT_SALT_ROUNDS = 12;

export const SIGNUP_DETAIL =
  'User successfully created. Check your email for confirmation.';
export const EMAIL_CONFIRMED = 'Email confirmed';
export const EMAIL_ALREADY_CONFIRMED = 'Your email is already confirmed';
export const CHECK_EMAIL = 'Check your email for confirmation.';

/**
 * AuthService — signup, login, token refresh and email confirmation.
 *
 * - Passwords are hashed with bcrypt; the hash never leaves this service
 * - Login issues an access/refresh pair and stores the refresh token; only
 *   the stored token can be exchanged, so a new login revokes the old one
 * - Confirmation emails are sent in the background: a mail failure is
 *   logged and never fails the request
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly tokenService: TokenService,
    private readonly mailService: MailService,
  ) {}

  /**
   * @throws EmailAlreadyExistsException if the email is already registered
   */
  async signup(dto: SignupDto): Promise<SignupResponseDto> {
    const existingUser = await this.usersService.getUserByEmail(dto.email);
    if (existingUser) {
      throw new EmailAlreadyExistsException(dto.email);
    }

    const password = await bcrypt.hash(dto.password, BCRYPT_SALT_ROUNDS);
    const user = await this.usersService.createUser({
      username: dto.username,
      email: dto.email,
      password,
    });

    this.sendConfirmationInBackground(user);

    return { user: UserResponseDto.fromEntity(user), detail: SIGNUP_DETAIL };
  }

  /**
   * @throws InvalidCredentialsException for an unknown email or wrong password
   * @throws EmailNotConfirmedException when the account is not confirmed yet
   */
  async login(dto: LoginDto): Promise<AuthResponseDto> {
    const user = await this.usersService.getUserByEmail(dto.email);

    if (!user) {
      // Still hash to prevent timing-based user enumeration
      await bcrypt.hash(dto.password, BCRYPT_SALT_ROUNDS);
      throw new InvalidCredentialsException();
    }

    const isPasswordValid = await bcrypt.compare(dto.password, user.password);
    if (!isPasswordValid) {
      throw new InvalidCredentialsException();
    }

    if (!user.confirmed) {
      throw new EmailNotConfirmedException();
    }

    this.logger.log(`User logged in: ${user.id} (${user.email})`);
    return this.issueTokens(user);
  }

  /**
   * Exchanges the stored refresh token for a new pair. A valid token that
   * does not match the stored one revokes the stored one.
   *
   * @throws InvalidRefreshTokenException
   */
  async refresh(refreshToken: string | null): Promise<AuthResponseDto> {
    if (!refreshToken) {
      throw new InvalidRefreshTokenException();
    }

    const email = await this.tokenService.verify(refreshToken, 'refresh_token');
    const user = email ? await this.usersService.getUserByEmail(email) : null;
    if (!user) {
      throw new InvalidRefreshTokenException();
    }

    if (user.refreshToken !== refreshToken) {
      this.logger.warn(`Refresh token mismatch for user ${user.id}; revoking`);
      await this.usersService.updateToken(user, null);
      throw new InvalidRefreshTokenException();
    }

    return this.issueTokens(user);
  }

  /**
   * @throws EmailVerificationException for a bad token or unknown user
   */
  async confirmEmail(token: string): Promise<MessageResponseDto> {
    const email = await this.tokenService.verify(token, 'email_token');
    const user = email ? await this.usersService.getUserByEmail(email) : null;
    if (!user) {
      throw new EmailVerificationException();
    }

    if (user.confirmed) {
      return { message: EMAIL_ALREADY_CONFIRMED };
    }

    await this.usersService.confirmEmail(user.email);
    return { message: EMAIL_CONFIRMED };
  }

  /**
   * Re-sends the confirmation link. The response does not reveal whether
   * an unconfirmed account exists for the address.
   */
  async requestEmail(email: string): Promise<MessageResponseDto> {
    const user = await this.usersService.getUserByEmail(email);

    if (user?.confirmed) {
      return { message: EMAIL_ALREADY_CONFIRMED };
    }

    if (user) {
      this.sendConfirmationInBackground(user);
    }

    return { message: CHECK_EMAIL };
  }

  // ── Private Helpers ───────────────────────────────────────

  private async issueTokens(user: User): Promise<AuthResponseDto> {
    const accessToken = await this.tokenService.createAccessToken(user.email);
    const refreshToken = await this.tokenService.createRefreshToken(user.email);
    await this.usersService.updateToken(user, refreshToken);

    return new AuthResponseDto(accessToken, refreshToken);
  }

  private sendConfirmationInBackground(user: User): void {
    this.sendConfirmation(user).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(
        `Confirmation email for user ${user.id} not delivered: ${message}`,
      );
    });
  }

  private async sendConfirmation(user: User): Promise<void> {
    const token = await this.tokenService.createEmailToken(user.email);
    await this.mailService.sendConfirmationEmail(user.email, user.username, token);
  }
}
