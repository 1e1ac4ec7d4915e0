import { format, isValid, parse } from 'date-fns';

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * `YYYY-MM-DD` 形式の文字列を日付に変換する。
 * 時刻付き・区切り文字違い・存在しない日付（2024-02-30 等）は null を返す。
 */
export function parseDateOnly(value: string): Date | null {
  if (!DATE_ONLY_PATTERN.test(value)) return null;
  const date = parse(value, 'yyyy-MM-dd', new Date());
  return isValid(date) ? date : null;
}

export function formatDateOnly(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}
