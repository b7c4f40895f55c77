import { z } from 'zod';

/**
 * Token endpoint success body (RFC 6749 section 5.1).
 * `expires_in` arrives as a number from most issuers and as a string from some.
 * @public
 */
export const OAuth2TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().positive().optional(),
  scope: z.string().optional(),
});

export type OAuth2TokenResponse = z.infer<typeof OAuth2TokenResponseSchema>;

/**
 * Token endpoint error body (RFC 6749 section 5.2).
 * @public
 */
export const OAuth2ErrorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
  error_codes: z.array(z.number()).optional(),
});

export type OAuth2ErrorResponse = z.infer<typeof OAuth2ErrorResponseSchema>;

/** Lifetime assumed when the issuer omits `expires_in` */
export const AUTH_DEFAULT_EXPIRY_SECONDS = 3600;
