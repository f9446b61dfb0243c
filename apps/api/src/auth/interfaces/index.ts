export type { JwtPayload, TokenScope } from './jwt-payload.interface';
export type {
  RequestUser,
  AuthenticatedRequest,
} from './authenticated-request.interface';
