import { UserResponseDto } from '../../users/dto/user-response.dto';

/**
 * Token pair returned by login and refresh.
 */
export class AuthResponseDto {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';

  constructor(accessToken: string, refreshToken: string) {
    this.accessToken = accessToken;
    this.refreshToken = refreshToken;
    this.tokenType = 'Bearer';
  }
}

/** Response of POST /auth/signup (HTTP 201). */
export interface SignupResponseDto {
  user: UserResponseDto;
  detail: string;
}

/** Plain acknowledgement used by the email confirmation routes. */
export interface MessageResponseDto {
  message: string;
}
