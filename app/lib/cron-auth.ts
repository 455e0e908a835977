import crypto from "node:crypto";

/** Constant-time check of `Authorization: Bearer <secret>`. */
export function isAuthorizedCronRequest(request: Request, secret: string | undefined): boolean {
  if (!secret) {
    return false;
  }
  const provided = request.headers.get("authorization") ?? "";
  const expected = `Bearer ${secret}`;
  const providedBuffer = Buffer.from(provided);
  const expectedBuffer = Buffer.from(expected);
  if (providedBuffer.length !== expectedBuffer.length) {
    return false;
  }
  return crypto.timingSafeEqual(providedBuffer, expectedBuffer);
}
