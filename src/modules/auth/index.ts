/**
 * Authentication Module Public API
 *
 * Exports types, use cases, adapters, and middleware for authentication.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  AuthSession,
  AnonymousSession,
  AuthContext,
  UserId,
  User,
  SessionRecord,
  IssuedSession,
  RequestAuth,
} from './core/types.js';

export type { AuthError } from './core/errors.js';

export type {
  AuthProvider,
  SessionExtractor,
  SignedToken,
  TokenSigner,
  PasswordHasher,
  UserRepository,
  SessionRepository,
} from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export {
  ANONYMOUS_SESSION,
  AUTH_HEADER,
  BEARER_PREFIX,
  SESSION_COOKIE_NAME,
  MIN_PASSWORD_LENGTH,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Type Constructors & Guards
// ─────────────────────────────────────────────────────────────────────────────

export { toUserId, isAuthenticated } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export {
  createInvalidTokenError,
  createTokenExpiredError,
  createTokenSignatureError,
  createAuthenticationRequiredError,
  createSessionRevokedError,
  createInvalidCredentialsError,
  createAccountDisabledError,
  createUserExistsError,
  createInvalidInputError,
  createAuthProviderError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Mappings
// ─────────────────────────────────────────────────────────────────────────────

export { AUTH_ERROR_HTTP_STATUS, getHttpStatusForError } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  authenticate,
  type AuthenticateDeps,
  type AuthenticateInput,
} from './core/usecases/authenticate.js';

export { requireAuth } from './core/usecases/require-auth.js';

export { register, type RegisterDeps, type RegisterInput } from './core/usecases/register.js';

export { login, type LoginDeps, type LoginInput } from './core/usecases/login.js';

export { logout, type LogoutDeps } from './core/usecases/logout.js';

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

// Session-backed JWT provider and signer (production)
export {
  makeJwtTokenSigner,
  makeSessionAuthProvider,
  type MakeJwtTokenSignerOptions,
  type MakeSessionAuthProviderOptions,
} from './shell/adapters/jwt-adapter.js';

// In-Memory Adapter (for testing)
export {
  makeInMemoryAuthProvider,
  createTestAuthProvider,
  type MakeInMemoryAuthProviderOptions,
} from './shell/adapters/in-memory-adapter.js';

export { scryptPasswordHasher } from './shell/crypto/password-hasher.js';

// ─────────────────────────────────────────────────────────────────────────────
// Repositories
// ─────────────────────────────────────────────────────────────────────────────

export { makeUserRepo, type UserRepoOptions } from './shell/repo/user-repo.js';
export { makeSessionRepo, type SessionRepoOptions } from './shell/repo/session-repo.js';

// ─────────────────────────────────────────────────────────────────────────────
// Extractors
// ─────────────────────────────────────────────────────────────────────────────

export { httpSessionExtractor, usesSessionCookie } from './shell/extractors/http-extractor.js';

// ─────────────────────────────────────────────────────────────────────────────
// Middleware (Fastify REST)
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeAuthMiddleware,
  requireAuthHandler,
  type MakeAuthMiddlewareDeps,
  type AuthHook,
} from './shell/middleware/fastify-auth.js';

export {
  registerCsrfProtection,
  isCsrfError,
  type CsrfOptions,
} from './shell/middleware/csrf.js';

// ─────────────────────────────────────────────────────────────────────────────
// REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export { makeAuthRoutes, type MakeAuthRoutesDeps } from './shell/rest/routes.js';
