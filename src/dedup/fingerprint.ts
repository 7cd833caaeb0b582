import { createHash } from 'node:crypto';

/** 지문용 정규화: 앞뒤 공백 제거, 소문자, 연속 공백 1칸 */
export function normalizeForFingerprint(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function contentFingerprint(text: string): string {
  return createHash('sha256').update(normalizeForFingerprint(text), 'utf8').digest('hex');
}
