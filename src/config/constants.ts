/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - zod로 값 검증 (잘못된 값이면 기본값으로 대체하지 않고 에러)
 */

import * as path from "path";
import { z } from "zod";

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 version 필드와 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Inventory Tracker",
} as const;

/**
 * 환경변수 스키마
 */
const InventoryEnvSchema = z.object({
  INVENTORY_DATA_FILE: z.string().min(1).optional(),
  LOW_STOCK_THRESHOLD: z.coerce.number().int().min(0).optional(),
});

/**
 * 인벤토리 설정
 */
export interface InventoryConfig {
  /** 저장 파일 절대 경로 */
  dataFile: string;
  /** 재고 부족 기본 임계값 (입력 생략 시 사용) */
  lowStockThreshold: number;
}

/**
 * 기본값
 */
export const INVENTORY_DEFAULTS = {
  /**
   * 저장 파일 경로
   * 환경변수: INVENTORY_DATA_FILE
   */
  DATA_FILE: "./data/inventory.json",

  /**
   * 재고 부족 임계값
   * 환경변수: LOW_STOCK_THRESHOLD
   */
  LOW_STOCK_THRESHOLD: 5,
} as const;

/**
 * 환경변수로부터 인벤토리 설정 생성
 * @param env - 기본값: process.env
 */
export function loadInventoryConfig(
  env: Record<string, string | undefined> = process.env,
): InventoryConfig {
  const parsed = InventoryEnvSchema.parse({
    INVENTORY_DATA_FILE: env.INVENTORY_DATA_FILE || undefined,
    LOW_STOCK_THRESHOLD: env.LOW_STOCK_THRESHOLD || undefined,
  });

  return {
    dataFile: path.resolve(
      parsed.INVENTORY_DATA_FILE ?? INVENTORY_DEFAULTS.DATA_FILE,
    ),
    lowStockThreshold:
      parsed.LOW_STOCK_THRESHOLD ?? INVENTORY_DEFAULTS.LOW_STOCK_THRESHOLD,
  };
}

/**
 * 로깅 컴포넌트 이름
 */
export const COMPONENT_NAMES = {
  REPOSITORY: "repository",
  STORE: "store",
  SESSION: "session",
  CLI: "cli",
} as const;

export type ComponentName =
  (typeof COMPONENT_NAMES)[keyof typeof COMPONENT_NAMES];
