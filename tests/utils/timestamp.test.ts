import { describe, it, expect } from "@jest/globals";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
  toIsoTimestamp,
} from "@/utils/timestamp";

// 로컬 타임존 기준 2025-01-05 10:07:03.045
const localClock = () => new Date(2025, 0, 5, 10, 7, 3, 45);

describe("timestamp", () => {
  it("getDateStringWithDash는 로컬 날짜를 YYYY-MM-DD로 반환해야 함", () => {
    expect(getDateStringWithDash(localClock)).toBe("2025-01-05");
  });

  it("getTimestampWithTimezone은 로컬 시각과 오프셋을 포함해야 함", () => {
    const timestamp = getTimestampWithTimezone(localClock);

    expect(timestamp.startsWith("2025-01-05T10:07:03.045")).toBe(true);
    expect(timestamp).toMatch(/[+-]\d{2}:\d{2}$/);
    expect(Date.parse(timestamp)).toBe(localClock().getTime());
  });

  it("toIsoTimestamp는 UTC ISO 문자열", () => {
    expect(toIsoTimestamp(new Date("2025-03-01T12:00:00.000Z"))).toBe(
      "2025-03-01T12:00:00.000Z",
    );
  });
});
