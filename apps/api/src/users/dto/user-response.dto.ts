import { User } from '@contacts/database';

/**
 * Public user profile data. Never includes the password hash or the
 * stored refresh token.
 *
 * Built only through fromEntity() so every field is mapped explicitly.
 */
export class UserResponseDto {
  id: number;
  username: string;
  email: string;
  avatar: string | null;
  createdAt: Date;

  private constructor(user: User) {
    this.id = user.id;
    this.username = user.username;
    this.email = user.email;
    this.avatar = user.avatar;
    this.createdAt = user.createdAt;
  }

  static fromEntity(user: User): UserResponseDto {
    return new UserResponseDto(user);
  }
}
