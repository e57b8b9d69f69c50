/**
 * Product 도메인 모델
 *
 * SOLID 원칙:
 * - SRP: 재고 상품 레코드 데이터만 표현
 * - 불변 객체 (저장소 밖으로는 Readonly 스냅샷만 전달)
 */

import { z } from "zod";

/**
 * 가격 소수 자릿수 (센트 단위 고정 소수점)
 */
export const PRICE_SCALE = 100;

/**
 * Product Zod 스키마 (저장 파일 레코드 검증용)
 *
 * Note: price는 소수 둘째 자리까지만 허용 (센트 단위로 정확히 표현 가능해야 함)
 * Note: lastUpdated는 ISO 8601 문자열 (offset 포함 허용)
 */
export const ProductSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().trim().min(1),
  price: z
    .number()
    .finite()
    .nonnegative()
    .refine((value) => isCentPrecise(value), {
      message: "price must have at most two decimal places",
    }),
  stockQuantity: z.number().int().nonnegative(),
  category: z.string().trim().min(1),
  lastUpdated: z.string().datetime({ offset: true }),
});

/**
 * Product 타입 (스키마로부터 추론, 읽기 전용)
 */
export type Product = Readonly<z.infer<typeof ProductSchema>>;

/**
 * 상품 생성 입력
 */
export interface NewProductInput {
  name: string;
  price: number;
  quantity: number;
  category: string;
}

/**
 * 상품 수정 입력 (재고는 adjustStock 으로만 변경)
 */
export interface ProductChanges {
  name?: string;
  price?: number;
  category?: string;
}

/**
 * 카테고리별 집계
 */
export interface CategorySummary {
  category: string;
  productCount: number;
  totalUnits: number;
  totalValue: number;
}

/**
 * 가격 → 센트 (정수)
 * 부동소수점 표현 오차(0.07 * 100 = 7.000000000000001)는 반올림으로 흡수
 */
export function toCents(price: number): number {
  return Math.round(price * PRICE_SCALE);
}

/**
 * 센트 (정수) → 가격
 */
export function fromCents(cents: number): number {
  return cents / PRICE_SCALE;
}

/**
 * 가격을 센트 단위로 정규화 (예: 19.999 → 20)
 */
export function normalizePrice(price: number): number {
  return fromCents(toCents(price));
}

/**
 * 가격이 센트 단위로 정확히 표현되는지 여부
 */
export function isCentPrecise(price: number): boolean {
  return Math.abs(price * PRICE_SCALE - toCents(price)) < 1e-6;
}

/**
 * 상품 재고 가치 (센트)
 * 가격 × 수량이 Number.MAX_SAFE_INTEGER 를 넘을 수 있으므로 bigint
 */
export function stockValueInCents(product: Product): bigint {
  return BigInt(toCents(product.price)) * BigInt(product.stockQuantity);
}

/**
 * 센트 합계 (bigint) → 금액, 정수부와 센트를 나눠 한 번만 변환
 */
export function centsToAmount(cents: bigint): number {
  const scale = BigInt(PRICE_SCALE);
  return Number(cents / scale) + Number(cents % scale) / PRICE_SCALE;
}
