/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 파일 출력 전용 (대화형 메뉴 출력과 섞이지 않도록 콘솔 출력 없음)
 * - 일일 로그 로테이션 (logs/YYYY-MM-DD/inventory.log)
 * - 에러는 logs/YYYY-MM-DD/error.log 에도 기록
 * - 구조화된 JSON 로깅
 *
 * 테스트 환경(NODE_ENV=test)에서는 silent 로거를 사용하며 파일을 만들지 않음
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, type RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { APP_METADATA } from "@/config/constants";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL || (NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  ERROR: 50,
  FATAL: 60,
} as const;

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "10M",
    },
  );
}

/**
 * 레벨별 라우팅 스트림
 * 전체 로그는 inventory.log, error 이상은 error.log 에도 기록
 */
class LevelRoutingStream implements DestinationStream {
  constructor(
    private readonly mainStream: RotatingFileStream,
    private readonly errorStream: RotatingFileStream,
  ) {}

  write(chunk: string): boolean {
    this.mainStream.write(chunk);

    const level = readLevel(chunk);
    if (level === "error" || level === "fatal") {
      this.errorStream.write(chunk);
    }
    return true;
  }
}

/**
 * JSON 로그 라인에서 level 필드 추출
 * 파싱 실패 시 undefined (main 스트림에는 이미 기록됨)
 */
function readLevel(chunk: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(chunk);
    if (typeof parsed === "object" && parsed !== null && "level" in parsed) {
      const { level } = parsed;
      if (typeof level === "string") return level;
      if (typeof level === "number") {
        if (level >= LOG_LEVELS.FATAL) return "fatal";
        if (level >= LOG_LEVELS.ERROR) return "error";
      }
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "inventory_tracker",
    version: APP_METADATA.VERSION,
    env: NODE_ENV,
  },
};

function createLogger(): pino.Logger {
  if (NODE_ENV === "test") {
    return pino({ level: "silent" });
  }

  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }

  const destination = new LevelRoutingStream(
    createRotatingStream("inventory"),
    createRotatingStream("error"),
  );
  return pino(baseConfig, destination);
}

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = createLogger();

export { logger };

export type Logger = pino.Logger;
