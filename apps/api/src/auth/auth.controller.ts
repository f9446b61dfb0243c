import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  Req,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import type { Request } from 'express';
import { ExtractJwt } from 'passport-jwt';
import { AuthService } from './auth.service';
import {
  SignupDto,
  LoginDto,
  RequestEmailDto,
  AuthResponseDto,
  SignupResponseDto,
  MessageResponseDto,
} from './dto';

const extractBearerToken = ExtractJwt.fromAuthHeaderAsBearerToken();

/**
 * AuthController — account lifecycle endpoints (all public).
 *
 * Routes:
 * - POST /auth/signup                 → Create an account, send confirmation email
 * - POST /auth/login                  → Exchange credentials for a token pair
 * - GET  /auth/refresh_token          → Exchange a refresh token (Bearer) for a new pair
 * - GET  /auth/confirmed_email/:token → Confirm an email address
 * - POST /auth/request_email          → Re-send the confirmation email
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 201 Created with the new user
   * @throws 409 Conflict if the email is taken
   */
  @Post('signup')
  @HttpCode(HttpStatus.CREATED)
  signup(@Body() dto: SignupDto): Promise<SignupResponseDto> {
    return this.authService.signup(dto);
  }

  /**
   * @throws 401 Unauthorized for bad credentials or an unconfirmed email
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: LoginDto): Promise<AuthResponseDto> {
    return this.authService.login(dto);
  }

  @Get('refresh_token')
  refreshToken(@Req() req: Request): Promise<AuthResponseDto> {
    return this.authService.refresh(extractBearerToken(req));
  }

  /**
   * @throws 400 Bad Request if the link is invalid or expired
   */
  @Get('confirmed_email/:token')
  confirmedEmail(@Param('token') token: string): Promise<MessageResponseDto> {
    return this.authService.confirmEmail(token);
  }

  @Post('request_email')
  @HttpCode(HttpStatus.OK)
  requestEmail(@Body() dto: RequestEmailDto): Promise<MessageResponseDto> {
    return this.authService.requestEmail(dto.email);
  }
}
