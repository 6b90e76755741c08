import { z } from 'zod';

export interface UrlValidationResult {
  valid: boolean;
  url?: URL;
  error?: string;
}

const DOWNLOADABLE_PROTOCOLS = new Set(['http:', 'https:']);

const UrlSchema = z
  .string()
  .trim()
  .min(1, { message: 'URL is empty' })
  .url({ message: 'Invalid URL format' })
  .transform((value, ctx) => {
    const url = new URL(value);
    if (!DOWNLOADABLE_PROTOCOLS.has(url.protocol)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Only http and https URLs can be downloaded' });
      return z.NEVER;
    }
    if (!url.hostname) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'URL has no host' });
      return z.NEVER;
    }
    return url;
  });

/**
 * URLValidator - checks that a string is a downloadable http(s) URL
 */
export class URLValidator {
  validate(input: string): UrlValidationResult {
    const result = UrlSchema.safeParse(input);
    if (!result.success) {
      return { valid: false, error: result.error.issues[0]?.message ?? 'Invalid URL' };
    }
    return { valid: true, url: result.data };
  }
}
