// src/utils/signature.ts
// HMAC-SHA256 sobre los bytes del archivo subido (hex), comparado en tiempo constante

import { createHash, createHmac, timingSafeEqual } from 'crypto';
import { createReadStream } from 'fs';

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

export async function hmacFileHex(filePath: string, secret: string): Promise<string> {
  const hmac = createHmac('sha256', secret);
  for await (const chunk of createReadStream(filePath)) {
    hmac.update(chunk);
  }
  return hmac.digest('hex');
}

const safeCompare = (a: string, b: string): boolean => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
};

export async function verifyFileSignature(filePath: string, signature: string, secret: string): Promise<boolean> {
  const computed = await hmacFileHex(filePath, secret);
  return safeCompare(computed, signature.trim().toLowerCase());
}
