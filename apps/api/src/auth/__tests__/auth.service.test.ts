import { Test } from '@nestjs/testing';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { User } from '@contacts/database';
import { UsersService, NewUser } from '../../users/users.service';
import { MailService } from '../../mail/mail.service';
import { TokenService } from '../token.service';
import {
  AuthService,
  CHECK_EMAIL,
  EMAIL_ALREADY_CONFIRMED,
  EMAIL_CONFIRMED,
  SIGNUP_DETAIL,
} from '../auth.service';
import {
  EmailAlreadyExistsException,
  EmailNotConfirmedException,
  EmailVerificationException,
  InvalidCredentialsException,
  InvalidRefreshTokenException,
} from '../exceptions';

const PASSWORD = 'correct-horse';

function user(overrides: Partial<User> = {}): User {
  return Object.assign(new User(), {
    id: 1,
    username: 'ann',
    email: 'ann@example.com',
    password: '',
    avatar: 'https://www.gravatar.com/avatar/abc?d=identicon',
    confirmed: true,
    refreshToken: null,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  });
}

describe('AuthService', () => {
  let passwordHash: string;
  let service: AuthService;
  let tokens: TokenService;

  const usersService = {
    getUserByEmail: jest.fn<Promise<User | null>, [string]>(),
    createUser: jest.fn<Promise<User>, [NewUser]>(),
    updateToken: jest.fn<Promise<void>, [User, string | null]>(),
    confirmEmail: jest.fn<Promise<void>, [string]>(),
  };
  const mailService = {
    sendConfirmationEmail: jest.fn<Promise<void>, [string, string, string]>(),
  };

  /** Resolves once the background confirmation email has been handed off. */
  function nextMail(): Promise<[string, string, string]> {
    return new Promise((resolve) => {
      mailService.sendConfirmationEmail.mockImplementation(
        async (email, username, token) => {
          resolve([email, username, token]);
        },
      );
    });
  }

  beforeAll(async () => {
    passwordHash = await bcrypt.hash(PASSWORD, 4);
  });

  beforeEach(async () => {
    jest.resetAllMocks();
    usersService.updateToken.mockResolvedValue(undefined);
    usersService.confirmEmail.mockResolvedValue(undefined);
    mailService.sendConfirmationEmail.mockResolvedValue(undefined);

    const moduleRef = await Test.createTestingModule({
      providers: [
        AuthService,
        TokenService,
        { provide: JwtService, useValue: new JwtService({ secret: 'test-secret' }) },
        { provide: ConfigService, useValue: new ConfigService({}) },
        { provide: UsersService, useValue: usersService },
        { provide: MailService, useValue: mailService },
      ],
    }).compile();

    service = moduleRef.get(AuthService);
    tokens = moduleRef.get(TokenService);
  });

  describe('signup', () => {
    it('rejects an email that is already registered', async () => {
      usersService.getUserByEmail.mockResolvedValue(user());

      await expect(
        service.signup({ username: 'ann', email: 'ann@example.com', password: PASSWORD }),
      ).rejects.toBeInstanceOf(EmailAlreadyExistsException);
      expect(usersService.createUser).not.toHaveBeenCalled();
    });

    it('stores a bcrypt hash and sends a confirmation email token', async () => {
      usersService.getUserByEmail.mockResolvedValue(null);
      usersService.createUser.mockImplementation(async (data) =>
        user({ ...data, confirmed: false }),
      );
      const mailed = nextMail();

      const result = await service.signup({
        username: 'ann',
        email: 'ann@example.com',
        password: PASSWORD,
      });

      const [stored] = usersService.createUser.mock.calls[0];
      expect(stored.password).not.toBe(PASSWORD);
      await expect(bcrypt.compare(PASSWORD, stored.password)).resolves.toBe(true);

      expect(result.detail).toBe(SIGNUP_DETAIL);
      expect(result.user).toMatchObject({ id: 1, username: 'ann', email: 'ann@example.com' });
      expect(result.user).not.toHaveProperty('password');

      const [email, username, token] = await mailed;
      expect(email).toBe('ann@example.com');
      expect(username).toBe('ann');
      await expect(tokens.verify(token, 'email_token')).resolves.toBe('ann@example.com');
    });

    it('succeeds when the confirmation email cannot be sent', async () => {
      usersService.getUserByEmail.mockResolvedValue(null);
      usersService.createUser.mockResolvedValue(user({ confirmed: false }));
      mailService.sendConfirmationEmail.mockRejectedValue(new Error('smtp down'));

      await expect(
        service.signup({ username: 'ann', email: 'ann@example.com', password: PASSWORD }),
      ).resolves.toMatchObject({ detail: SIGNUP_DETAIL });
    });
  });

  describe('login', () => {
    it('rejects an unknown email', async () => {
      usersService.getUserByEmail.mockResolvedValue(null);

      await expect(
        service.login({ email: 'nobody@example.com', password: PASSWORD }),
      ).rejects.toBeInstanceOf(InvalidCredentialsException);
    });

    it('rejects a wrong password', async () => {
      usersService.getUserByEmail.mockResolvedValue(user({ password: passwordHash }));

      await expect(
        service.login({ email: 'ann@example.com', password: 'wrong-password' }),
      ).rejects.toBeInstanceOf(InvalidCredentialsException);
    });

    it('rejects an unconfirmed account', async () => {
      usersService.getUserByEmail.mockResolvedValue(
        user({ password: passwordHash, confirmed: false }),
      );

      await expect(
        service.login({ email: 'ann@example.com', password: PASSWORD }),
      ).rejects.toBeInstanceOf(EmailNotConfirmedException);
    });

    it('issues a token pair and stores the refresh token', async () => {
      const account = user({ password: passwordHash });
      usersService.getUserByEmail.mockResolvedValue(account);

      const result = await service.login({ email: 'ann@example.com', password: PASSWORD });

      expect(result.tokenType).toBe('Bearer');
      await expect(tokens.verify(result.accessToken, 'access_token')).resolves.toBe(
        'ann@example.com',
      );
      await expect(tokens.verify(result.refreshToken, 'refresh_token')).resolves.toBe(
        'ann@example.com',
      );
      expect(usersService.updateToken).toHaveBeenCalledWith(account, result.refreshToken);
    });
  });

  describe('refresh', () => {
    it('rejects a missing token', async () => {
      await expect(service.refresh(null)).rejects.toBeInstanceOf(
        InvalidRefreshTokenException,
      );
    });

    it('rejects an access token', async () => {
      const access = await tokens.createAccessToken('ann@example.com');

      await expect(service.refresh(access)).rejects.toBeInstanceOf(
        InvalidRefreshTokenException,
      );
      expect(usersService.getUserByEmail).not.toHaveBeenCalled();
    });

    it('revokes the stored token when a different one is presented', async () => {
      const presented = await tokens.createRefreshToken('ann@example.com');
      const account = user({ refreshToken: 'previously-stored-token' });
      usersService.getUserByEmail.mockResolvedValue(account);

      await expect(service.refresh(presented)).rejects.toBeInstanceOf(
        InvalidRefreshTokenException,
      );
      expect(usersService.updateToken).toHaveBeenCalledWith(account, null);
    });

    it('exchanges the stored token for a new pair', async () => {
      const stored = await tokens.createRefreshToken('ann@example.com');
      const account = user({ refreshToken: stored });
      usersService.getUserByEmail.mockResolvedValue(account);

      const result = await service.refresh(stored);

      await expect(tokens.verify(result.accessToken, 'access_token')).resolves.toBe(
        'ann@example.com',
      );
      expect(usersService.updateToken).toHaveBeenCalledWith(account, result.refreshToken);
    });
  });

  describe('confirmEmail', () => {
    it('rejects a token of the wrong scope', async () => {
      const access = await tokens.createAccessToken('ann@example.com');

      await expect(service.confirmEmail(access)).rejects.toBeInstanceOf(
        EmailVerificationException,
      );
    });

    it('rejects a token for an unknown user', async () => {
      usersService.getUserByEmail.mockResolvedValue(null);
      const token = await tokens.createEmailToken('ghost@example.com');

      await expect(service.confirmEmail(token)).rejects.toBeInstanceOf(
        EmailVerificationException,
      );
    });

    it('confirms an unconfirmed account', async () => {
      usersService.getUserByEmail.mockResolvedValue(user({ confirmed: false }));
      const token = await tokens.createEmailToken('ann@example.com');

      await expect(service.confirmEmail(token)).resolves.toEqual({
        message: EMAIL_CONFIRMED,
      });
      expect(usersService.confirmEmail).toHaveBeenCalledWith('ann@example.com');
    });

    it('reports an account that is already confirmed', async () => {
      usersService.getUserByEmail.mockResolvedValue(user({ confirmed: true }));
      const token = await tokens.createEmailToken('ann@example.com');

      await expect(service.confirmEmail(token)).resolves.toEqual({
        message: EMAIL_ALREADY_CONFIRMED,
      });
      expect(usersService.confirmEmail).not.toHaveBeenCalled();
    });
  });

  describe('requestEmail', () => {
    it('answers the same way for an unknown address', async () => {
      usersService.getUserByEmail.mockResolvedValue(null);

      await expect(service.requestEmail('ghost@example.com')).resolves.toEqual({
        message: CHECK_EMAIL,
      });
      expect(mailService.sendConfirmationEmail).not.toHaveBeenCalled();
    });

    it('re-sends the link to an unconfirmed account', async () => {
      usersService.getUserByEmail.mockResolvedValue(user({ confirmed: false }));
      const mailed = nextMail();

      await expect(service.requestEmail('ann@example.com')).resolves.toEqual({
        message: CHECK_EMAIL,
      });

      const [email] = await mailed;
      expect(email).toBe('ann@example.com');
    });

    it('does not mail a confirmed account', async () => {
      usersService.getUserByEmail.mockResolvedValue(user({ confirmed: true }));

      await expect(service.requestEmail('ann@example.com')).resolves.toEqual({
        message: EMAIL_ALREADY_CONFIRMED,
      });
      expect(mailService.sendConfirmationEmail).not.toHaveBeenCalled();
    });
  });
});
