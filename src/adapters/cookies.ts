import { promises as fsPromises } from 'node:fs';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('cookies');

export const DEFAULT_COOKIE_DOMAIN = '.tiktok.com';
/** Far-future expiry used when the export carries none */
export const DEFAULT_COOKIE_EXPIRY = 2147483647;

/**
 * One entry of a browser cookie export (the JSON array most cookie-export
 * extensions produce). Unknown fields are ignored.
 */
export const storedCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().optional(),
  path: z.string().optional(),
  secure: z.boolean().optional(),
  httpOnly: z.boolean().optional(),
  expiry: z.number().optional(),
  expirationDate: z.number().optional(),
});

export const storedCookiesSchema = z.array(storedCookieSchema);

export type StoredCookie = z.infer<typeof storedCookieSchema>;

/** Shape accepted by Playwright's `BrowserContext.addCookies` */
export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  secure: boolean;
  httpOnly: boolean;
  expires?: number;
}

export class CookieFileError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Cookie file ${filePath}: ${message}`, options);
    this.name = 'CookieFileError';
    Object.setPrototypeOf(this, CookieFileError.prototype);
  }
}

function expiryOf(cookie: StoredCookie): number | undefined {
  return cookie.expiry ?? cookie.expirationDate;
}

/**
 * Reads and validates a JSON cookie export
 * @throws {CookieFileError} when the file is missing or malformed
 */
export async function loadCookies(filePath: string): Promise<StoredCookie[]> {
  logger.info(`Loading cookies from ${filePath}`);

  let raw: string;
  try {
    raw = await fsPromises.readFile(filePath, 'utf8');
  } catch (error) {
    throw new CookieFileError(filePath, 'could not be read', { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CookieFileError(filePath, 'is not valid JSON', { cause: error });
  }

  const result = storedCookiesSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new CookieFileError(filePath, `unexpected format${where}: ${issue?.message ?? 'invalid'}`);
  }

  logger.info(`Loaded ${result.data.length} cookies`);
  return result.data;
}

/**
 * Renders cookies in the Netscape cookie-jar format yt-dlp reads
 */
export function toNetscapeCookieFile(cookies: StoredCookie[]): string {
  const lines = ['# Netscape HTTP Cookie File'];
  for (const cookie of cookies) {
    const expiry = Math.trunc(expiryOf(cookie) ?? DEFAULT_COOKIE_EXPIRY);
    lines.push(
      [
        cookie.domain ?? DEFAULT_COOKIE_DOMAIN,
        'TRUE',
        cookie.path ?? '/',
        cookie.secure ? 'TRUE' : 'FALSE',
        String(expiry),
        cookie.name,
        cookie.value,
      ].join('\t')
    );
  }
  return `${lines.join('\n')}\n`;
}

export async function writeNetscapeCookies(cookies: StoredCookie[], filePath: string): Promise<void> {
  await fsPromises.writeFile(filePath, toNetscapeCookieFile(cookies), 'utf8');
  logger.info(`Wrote ${cookies.length} cookies to ${filePath}`);
}

export function toBrowserCookie(cookie: StoredCookie): BrowserCookie {
  const expires = expiryOf(cookie);
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain ?? DEFAULT_COOKIE_DOMAIN,
    path: cookie.path ?? '/',
    secure: cookie.secure ?? true,
    httpOnly: cookie.httpOnly ?? false,
    ...(expires !== undefined ? { expires: Math.trunc(expires) } : {}),
  };
}
