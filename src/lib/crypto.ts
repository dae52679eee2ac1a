import crypto from "crypto"

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex")
}

// URL-safe random token, same alphabet as base64url
export function randomToken(bytes: number): string {
  return crypto.randomBytes(bytes).toString("base64url")
}

export function newRequestId(): string {
  return crypto.randomUUID()
}
