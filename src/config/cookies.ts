import { z } from "zod";
import type { BrowserContext } from "playwright";
import { readJson } from "../utils/fs";

export type BrowserCookie = Parameters<BrowserContext["addCookies"]>[0][number];

type SameSite = NonNullable<BrowserCookie["sameSite"]>;

// Lower-cased keys; "unspecified" and unknown values are dropped.
const SAME_SITE: Record<string, SameSite> = {
  strict: "Strict",
  lax: "Lax",
  none: "None",
  no_restriction: "None"
};

const CookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  url: z.string().optional(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expires: z.number().optional(),
  expirationDate: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.string().optional()
});

export const CookieFileSchema = z.union([
  z.array(CookieSchema),
  z.object({ cookies: z.array(CookieSchema) })
]);

export type RawCookie = z.infer<typeof CookieSchema>;

export function normalizeCookie(raw: RawCookie): BrowserCookie {
  const cookie: BrowserCookie = { name: raw.name, value: raw.value };
  if (raw.url !== undefined) cookie.url = raw.url;
  if (raw.domain !== undefined) cookie.domain = raw.domain;
  if (raw.path !== undefined) cookie.path = raw.path;

  const expires = raw.expires ?? raw.expirationDate;
  if (expires !== undefined) cookie.expires = expires;
  if (raw.httpOnly !== undefined) cookie.httpOnly = raw.httpOnly;
  if (raw.secure !== undefined) cookie.secure = raw.secure;

  const sameSite = raw.sameSite ? SAME_SITE[raw.sameSite.toLowerCase()] : undefined;
  if (sameSite) cookie.sameSite = sameSite;
  return cookie;
}

export function parseCookieFile(data: unknown): BrowserCookie[] {
  const parsed = CookieFileSchema.parse(data);
  const raw = Array.isArray(parsed) ? parsed : parsed.cookies;
  return raw.map(normalizeCookie);
}

export async function loadCookies(filePath: string): Promise<BrowserCookie[]> {
  const data = await readJson<unknown>(filePath);
  return parseCookieFile(data);
}
