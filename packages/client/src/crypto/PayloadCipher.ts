import { createCipheriv, createDecipheriv } from "node:crypto";

import { InvalidConfigurationError, MalformedPayloadError } from "../errors.js";

export type DecryptResult =
  | { kind: "decrypted"; body: Buffer }
  /** Not a whole number of cipher blocks: the payload was published in plaintext. */
  | { kind: "legacy"; body: Buffer };

const BASE64_TEXT = /^[A-Za-z0-9+/]*={0,2}$/;

function decodeBase64Text(payload: Buffer): Buffer {
  const text = payload.toString("latin1");
  const validLength = text.includes("=") ? text.length % 4 === 0 : text.length % 4 !== 1;
  if (!BASE64_TEXT.test(text) || !validLength) {
    throw new MalformedPayloadError("Payload is not base64 text");
  }
  return Buffer.from(text, "base64");
}

/**
 * AES-128 in ECB mode over zero-padded plaintext, carried as base64 text.
 *
 * Padding always adds between 1 and 16 zero bytes and is never stripped on
 * decrypt, so trailing zeros in the original body cannot be told apart from
 * padding.
 */
export class PayloadCipher {
  static readonly ALGORITHM = "aes-128-ecb";
  static readonly BLOCK_SIZE = 16;

  private constructor(private readonly key: Buffer) {}

  /** Keys longer than 16 characters are cut to their first 16. */
  static fromKey(cipherKey: string): PayloadCipher {
    if (cipherKey.length < PayloadCipher.BLOCK_SIZE) {
      throw new InvalidConfigurationError("Cipher key must be at least 16 characters", ["cipherKey"]);
    }
    const key = Buffer.from(cipherKey.slice(0, PayloadCipher.BLOCK_SIZE), "utf8");
    if (key.length !== PayloadCipher.BLOCK_SIZE) {
      throw new InvalidConfigurationError("The first 16 characters of the cipher key must encode to 16 bytes", [
        "cipherKey",
      ]);
    }
    return new PayloadCipher(key);
  }

  encrypt(body: Buffer | Uint8Array | string): Buffer {
    const plaintext = typeof body === "string" ? Buffer.from(body, "utf8") : Buffer.from(body);
    const pad = PayloadCipher.BLOCK_SIZE - (plaintext.length % PayloadCipher.BLOCK_SIZE);
    const padded = Buffer.concat([plaintext, Buffer.alloc(pad)]);

    const cipher = createCipheriv(PayloadCipher.ALGORITHM, this.key, null);
    cipher.setAutoPadding(false);
    const encrypted = Buffer.concat([cipher.update(padded), cipher.final()]);
    return Buffer.from(encrypted.toString("base64"), "latin1");
  }

  decrypt(payload: Buffer): DecryptResult {
    const encrypted = decodeBase64Text(payload);
    if (encrypted.length === 0 || encrypted.length % PayloadCipher.BLOCK_SIZE !== 0) {
      return { kind: "legacy", body: payload };
    }
    const decipher = createDecipheriv(PayloadCipher.ALGORITHM, this.key, null);
    decipher.setAutoPadding(false);
    return { kind: "decrypted", body: Buffer.concat([decipher.update(encrypted), decipher.final()]) };
  }
}
