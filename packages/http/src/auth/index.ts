export type { AuthenticationMethod, AuthenticationOptions } from './authentication-method.js';
export { CookieAuthentication, type CookieAuthenticationConfig } from './cookie-authentication.js';
export { HeaderKeyAuthentication, type HeaderKeyAuthenticationConfig } from './header-key-authentication.js';
export { NoAuthentication } from './no-authentication.js';
export {
  TokenPairAuthentication,
  type RefreshFunction,
  type TokenPair,
  type TokenPairAuthenticationConfig,
} from './token-pair-authentication.js';
