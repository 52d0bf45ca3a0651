import { createHash, createHmac, randomUUID } from "node:crypto";

export const SIGNATURE_METHOD = "HMAC-SHA256";
export const SIGNATURE_VERSION = "1.0";

export interface SigningCredentials {
  accessKey: string;
  accessSecret: string;
}

export interface SigningInput {
  nonce: string;
  /** Unix time in seconds. */
  timestamp: number;
}

export type SignedHeaders = Record<string, string>;

export function contentMd5(body: string): string {
  return createHash("md5").update(body, "utf8").digest("hex");
}

/**
 * The upstream verifies the signature over these six lines, in this order,
 * with these exact names.
 */
export function canonicalString(accessKey: string, md5: string, input: SigningInput): string {
  return [
    `x-bili-accesskeyid:${accessKey}`,
    `x-bili-content-md5:${md5}`,
    `x-bili-signature-method:${SIGNATURE_METHOD}`,
    `x-bili-signature-nonce:${input.nonce}`,
    `x-bili-signature-version:${SIGNATURE_VERSION}`,
    `x-bili-timestamp:${input.timestamp}`,
  ].join("\n");
}

export function signRequest(
  body: string,
  credentials: SigningCredentials,
  input: SigningInput = freshSigningInput()
): SignedHeaders {
  const md5 = contentMd5(body);
  const signature = createHmac("sha256", credentials.accessSecret)
    .update(canonicalString(credentials.accessKey, md5, input), "utf8")
    .digest("hex");

  return {
    Accept: "application/json",
    "Content-Type": "application/json",
    "x-bili-accesskeyid": credentials.accessKey,
    "x-bili-content-md5": md5,
    "x-bili-signature-method": SIGNATURE_METHOD,
    "x-bili-signature-nonce": input.nonce,
    "x-bili-signature-version": SIGNATURE_VERSION,
    "x-bili-timestamp": String(input.timestamp),
    Authorization: signature,
  };
}

export function freshSigningInput(now: number = Date.now()): SigningInput {
  return { nonce: randomUUID(), timestamp: Math.floor(now / 1000) };
}
