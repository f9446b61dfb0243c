import { IsEmail } from 'class-validator';

/** Body of POST /auth/request_email. */
export class RequestEmailDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  email!: string;
}
