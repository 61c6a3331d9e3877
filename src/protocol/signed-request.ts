/**
 * Signed-request verification.
 *
 * A signed request is `<b64url signature>.<b64url JSON envelope>`. The
 * signature is HMAC-SHA256 over the encoded envelope, keyed by the app
 * secret. Envelopes using "AES-256-CBC HMAC-SHA256" also carry an
 * encrypted `payload` and its `iv`, and expire after `maxAge` seconds.
 *
 * The signature is always checked before the payload is decrypted or
 * any envelope field is handed back.
 */

import { createDecipheriv, createHmac } from "node:crypto";
import { z } from "zod";

import { SignatureError } from "./errors.js";
import {
  DEFAULT_SIGNED_REQUEST_MAX_AGE,
  base64UrlDecode,
  epochSeconds,
  isJSONObject,
  safeEqual,
  type JSONObject,
} from "./types.js";

export const SIGNED_REQUEST_ALGORITHMS = [
  "HMAC-SHA256",
  "AES-256-CBC HMAC-SHA256",
] as const;

export type SignedRequestAlgorithm = (typeof SIGNED_REQUEST_ALGORITHMS)[number];

// Fields an encrypted envelope must carry; plain envelopes are returned as-is
const encryptedFieldsSchema = z.object({
  iv: z.string(),
  payload: z.string(),
});

type EncryptedFields = z.infer<typeof encryptedFieldsSchema>;

const SUPPORTED: ReadonlySet<unknown> = new Set(SIGNED_REQUEST_ALGORITHMS);

function isSupported(algorithm: unknown): algorithm is SignedRequestAlgorithm {
  return SUPPORTED.has(algorithm);
}

function malformed(detail: string): SignatureError {
  return new SignatureError("malformed", `Invalid request. (${detail}.)`);
}

function parseJSONObject(text: string): JSONObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJSONObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** `issued_at` as epoch seconds; anything unreadable counts as 0. */
function issuedAt(envelope: JSONObject): number {
  const raw = envelope["issued_at"];
  if (typeof raw !== "number" && typeof raw !== "string") {
    return 0;
  }
  const value = Number.parseInt(String(raw), 10);
  return Number.isNaN(value) ? 0 : value;
}

/** Strip surrounding whitespace, NULs and padding bytes left by the cipher. */
function stripPlaintext(text: string): string {
  return text.replace(/^[\x00-\x20]+/, "").replace(/[\x00-\x20]+$/, "");
}

function decryptPayload(
  envelope: JSONObject,
  appSecret: string
): JSONObject {
  const failed = new SignatureError(
    "decryption_failed",
    "Invalid request. (Decryption failed.)"
  );
  const fields = encryptedFieldsSchema.safeParse(envelope);
  if (!fields.success) {
    throw failed;
  }
  const { iv, payload }: EncryptedFields = fields.data;

  let plaintext: string;
  try {
    const decipher = createDecipheriv(
      "aes-256-cbc",
      Buffer.from(appSecret, "utf-8"),
      base64UrlDecode(iv)
    );
    decipher.setAutoPadding(false);
    plaintext = Buffer.concat([
      decipher.update(base64UrlDecode(payload)),
      decipher.final(),
    ]).toString("utf-8");
  } catch {
    throw failed;
  }

  const data = parseJSONObject(stripPlaintext(plaintext));
  if (data === null) {
    throw failed;
  }
  return data;
}

/**
 * Verify a signed request and return its data.
 *
 * For "HMAC-SHA256" the decoded envelope itself is returned; for
 * "AES-256-CBC HMAC-SHA256" the decrypted payload is. `appSecret` doubles
 * as the AES-256 key, so encrypted requests need a 32-byte secret.
 *
 * @throws SignatureError with `reason` naming the failed check.
 */
export function parseSignedRequest(
  input: string,
  appSecret: string,
  maxAge: number = DEFAULT_SIGNED_REQUEST_MAX_AGE
): JSONObject {
  const dot = input.indexOf(".");
  if (dot < 0) {
    throw malformed("Missing signature");
  }
  const encodedSig = input.slice(0, dot);
  const encodedEnvelope = input.slice(dot + 1);

  const envelope = parseJSONObject(base64UrlDecode(encodedEnvelope).toString("utf-8"));
  if (envelope === null) {
    throw malformed("Envelope is not a JSON object");
  }

  const algorithm = envelope["algorithm"];
  if (!isSupported(algorithm)) {
    throw new SignatureError(
      "unsupported_algorithm",
      "Invalid request. (Unsupported algorithm.)"
    );
  }

  const encrypted = algorithm === "AES-256-CBC HMAC-SHA256";
  if (encrypted && issuedAt(envelope) < epochSeconds() - maxAge) {
    throw new SignatureError("too_old", "Invalid request. (Too old.)");
  }

  const expected = createHmac("sha256", appSecret)
    .update(encodedEnvelope)
    .digest();
  if (!safeEqual(expected, base64UrlDecode(encodedSig))) {
    throw new SignatureError(
      "invalid_signature",
      "Invalid request. (Invalid signature.)"
    );
  }

  if (!encrypted) {
    return envelope;
  }
  return decryptPayload(envelope, appSecret);
}
