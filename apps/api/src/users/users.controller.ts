import {
  Controller,
  Get,
  Patch,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { JwtAuthGuard } from '../auth/guards';
import { CurrentUser } from '../auth/decorators';
import type { RequestUser } from '../auth/interfaces';
import { UsersService } from './users.service';
import { UserResponseDto } from './dto/user-response.dto';
import { InvalidCredentialsException } from '../auth/exceptions';

/**
 * Multer keeps the avatar in memory; it goes straight to MinIO.
 * The 10 MB cap here is a backstop for the service-level limit.
 */
const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: { fileSize: 10 * 1024 * 1024 },
};

/**
 * Routes:
 *   GET   /users/me      — profile of the caller
 *   PATCH /users/avatar  — replace the caller's avatar (multipart "file")
 */
@Controller('users')
@UseGuards(JwtAuthGuard)
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  async me(@CurrentUser() user: RequestUser): Promise<UserResponseDto> {
    const profile = await this.usersService.getUserByEmail(user.email);
    if (!profile) {
      throw new InvalidCredentialsException();
    }
    return UserResponseDto.fromEntity(profile);
  }

  @Patch('avatar')
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  async updateAvatar(
    @CurrentUser() user: RequestUser,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<UserResponseDto> {
    const updated = await this.usersService.changeAvatar(
      user.userId,
      user.email,
      file,
    );
    if (!updated) {
      throw new InvalidCredentialsException();
    }
    return UserResponseDto.fromEntity(updated);
  }
}
