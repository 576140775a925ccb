import { createHmac, timingSafeEqual } from "node:crypto"

/**
 * HMAC-SHA256 over `"<key> <contentLength>"`, hex encoded. This is what the
 * XMPP server's upload component puts into the `v` query parameter.
 */
export function signUpload(secret: string, key: string, contentLength: number): string {
  return createHmac("sha256", secret).update(`${key} ${contentLength}`, "utf8").digest("hex")
}

export function verifyUploadSignature(
  secret: string,
  key: string,
  contentLength: number,
  provided: string,
): boolean {
  const expected = Buffer.from(signUpload(secret, key, contentLength), "utf8")
  const actual = Buffer.from(provided, "utf8")

  if (expected.length !== actual.length) return false

  return timingSafeEqual(expected, actual)
}
