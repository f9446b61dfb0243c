import { IsEmail, IsString, MinLength } from 'class-validator';

/**
 * Body of POST /auth/login.
 *
 * Only presence and shape are checked here; AuthService decides between
 * "invalid credentials" and "email not confirmed".
 */
export class LoginDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  email!: string;

  @IsString()
  @MinLength(1, { message: 'Password is required' })
  password!: string;
}
