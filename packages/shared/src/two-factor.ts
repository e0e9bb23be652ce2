import { createHash } from "node:crypto";

export function normalizeBackupCode(code: string): string {
  return code.trim().toUpperCase();
}

export function hashBackupCode(code: string): string {
  return createHash("sha256").update(normalizeBackupCode(code)).digest("hex");
}

export function isBackupCodeFormat(code: string): boolean {
  return /^[0-9A-F]{4}-[0-9A-F]{4}-[0-9A-F]{4}$/.test(normalizeBackupCode(code));
}
