export { EmailAlreadyExistsException } from './email-already-exists.exception';
export {
  InvalidCredentialsException,
  EmailNotConfirmedException,
} from './invalid-credentials.exception';
export {
  InvalidRefreshTokenException,
  EmailVerificationException,
} from './token.exceptions';
