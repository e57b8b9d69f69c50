/**
 * 타임스탬프 유틸리티
 *
 * - 로그 라인: 로컬 타임존 오프셋 포함 (getTimestampWithTimezone)
 * - 저장 파일 lastUpdated / savedAt: UTC ISO 8601 (toIsoTimestamp)
 */

/**
 * 현재 시각 제공 함수 타입 (테스트에서 고정 시각 주입용)
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const pad = (value: number, length = 2): string =>
  String(value).padStart(length, "0");

/**
 * YYYY-MM-DD (로컬 타임존)
 */
function localDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * +HH:MM / -HH:MM
 */
function offsetSuffix(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? "+" : "-";
  const minutes = Math.abs(offset);
  return `${sign}${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
}

/**
 * 타임존 정보가 포함된 타임스탬프 (예: 2025-10-30T12:34:56.789+09:00)
 */
export function getTimestampWithTimezone(clock: Clock = systemClock): string {
  const now = clock();
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
  return `${localDate(now)}T${time}${offsetSuffix(now)}`;
}

/**
 * 로그 디렉터리 이름용 날짜 (YYYY-MM-DD, 로컬 타임존)
 */
export function getDateStringWithDash(clock: Clock = systemClock): string {
  return localDate(clock());
}

export function toIsoTimestamp(date: Date): string {
  return date.toISOString();
}
