export { SignupDto } from './signup.dto';
export { LoginDto } from './login.dto';
export { RequestEmailDto } from './request-email.dto';
export { AuthResponseDto } from './auth-response.dto';
export type { SignupResponseDto, MessageResponseDto } from './auth-response.dto';
