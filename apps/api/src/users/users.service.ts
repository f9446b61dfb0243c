import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '@contacts/database';
import { StorageService } from '../storage/storage.service';
import { parseNumber } from '../common/parse-number';
import { gravatarUrl } from './gravatar';
import {
  ALLOWED_AVATAR_MIME_TYPES,
  AvatarTooLargeException,
  InvalidAvatarTypeException,
  MissingAvatarException,
} from './exceptions/avatar.exceptions';

const BYTES_PER_MB = 1024 * 1024;
const ALLOWED_MIME_TYPES = new Set<string>(ALLOWED_AVATAR_MIME_TYPES);

export interface NewUser {
  username: string;
  email: string;
  /** Already hashed */
  password: string;
}

/** The parts of an uploaded file the avatar flow needs. */
export interface AvatarUpload {
  buffer: Buffer;
  mimetype: string;
  size: number;
}

/**
 * UsersService — the identity store.
 *
 * Emails are stored and looked up lower-cased.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);
  private readonly maxAvatarBytes: number;

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly storageService: StorageService,
    configService: ConfigService,
  ) {
    this.maxAvatarBytes =
      parseNumber(configService.get<string>('AVATAR_MAX_FILE_SIZE_MB'), 5) *
      BYTES_PER_MB;
  }

  getUserByEmail(email: string): Promise<User | null> {
    return this.userRepository.findOne({
      where: { email: email.toLowerCase() },
    });
  }

  /** Persists a new, unconfirmed account with a Gravatar avatar. */
  async createUser(data: NewUser): Promise<User> {
    const email = data.email.toLowerCase();
    const user = this.userRepository.create({
      username: data.username.trim(),
      email,
      password: data.password,
      avatar: gravatarUrl(email),
      confirmed: false,
      refreshToken: null,
    });

    const saved = await this.userRepository.save(user);
    this.logger.log(`User registered: ${saved.id} (${saved.email})`);
    return saved;
  }

  async updateToken(user: User, token: string | null): Promise<void> {
    user.refreshToken = token;
    await this.userRepository.update({ id: user.id }, { refreshToken: token });
  }

  async confirmEmail(email: string): Promise<void> {
    await this.userRepository.update(
      { email: email.toLowerCase() },
      { confirmed: true },
    );
    this.logger.log(`Email confirmed: ${email}`);
  }

  async updateAvatar(email: string, url: string): Promise<User | null> {
    const user = await this.getUserByEmail(email);
    if (!user) return null;

    user.avatar = url;
    return this.userRepository.save(user);
  }

  /**
   * Validates the image, stores it and points the user's avatar at it.
   * Returns null when the user no longer exists.
   */
  async changeAvatar(
    userId: number,
    email: string,
    file: AvatarUpload | undefined,
  ): Promise<User | null> {
    const image = this.validateAvatar(file);
    const url = await this.storageService.uploadAvatar(
      userId,
      image.buffer,
      image.mimetype,
    );
    return this.updateAvatar(email, url);
  }

  // ── Private methods ──────────────────────────────────────

  private validateAvatar(file: AvatarUpload | undefined): AvatarUpload {
    if (!file || file.size === 0) {
      throw new MissingAvatarException();
    }

    if (!ALLOWED_MIME_TYPES.has(file.mimetype)) {
      throw new InvalidAvatarTypeException(file.mimetype);
    }

    if (file.size > this.maxAvatarBytes) {
      throw new AvatarTooLargeException(this.maxAvatarBytes / BYTES_PER_MB);
    }

    return file;
  }
}
