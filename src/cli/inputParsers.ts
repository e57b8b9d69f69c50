/**
 * 메뉴 입력 파서
 *
 * 사용자가 입력한 문자열을 zod 로 검증 후 값으로 변환
 * 실패 시 메뉴에 출력할 메시지 반환
 */

import { z } from "zod";

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };

export type InputParser<T> = (input: string) => ParseResult<T>;

const IntegerTextSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "정수를 입력하세요")
  .transform(Number)
  .pipe(z.number().safe("숫자가 너무 큽니다"));

const PriceTextSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d{1,2})?$/, "0 이상의 가격을 소수 둘째 자리까지 입력하세요")
  .transform(Number)
  .pipe(z.number().finite());

const TextSchema = z.string().trim().min(1, "빈 값은 입력할 수 없습니다");

function fromSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, string>): InputParser<T> {
  return (input) => {
    const parsed = schema.safeParse(input);
    if (parsed.success) {
      return { ok: true, value: parsed.data };
    }
    return {
      ok: false,
      message: parsed.error.issues[0]?.message ?? "잘못된 입력입니다",
    };
  };
}

/** 상품 id (1 이상) */
export const parseProductId: InputParser<number> = fromSchema(
  IntegerTextSchema.pipe(z.number().int().positive("id는 1 이상입니다")),
);

/** 수량 (0 이상) */
export const parseQuantity: InputParser<number> = fromSchema(
  IntegerTextSchema.pipe(z.number().int().nonnegative("수량은 0 이상입니다")),
);

/** 입고/판매 수량 (1 이상) */
export const parseAmount: InputParser<number> = fromSchema(
  IntegerTextSchema.pipe(z.number().int().positive("수량은 1 이상입니다")),
);

export const parsePrice: InputParser<number> = fromSchema(PriceTextSchema);

export const parseText: InputParser<string> = fromSchema(TextSchema);

/**
 * 선택 입력 래퍼: 빈 입력은 undefined (값 없음)
 * 예) 재고 부족 임계값 - 빈 입력은 기본값 사용, "0"은 임계값 0
 */
export function optional<T>(parser: InputParser<T>): InputParser<T | undefined> {
  return (input) => {
    if (input.trim() === "") {
      return { ok: true, value: undefined };
    }
    return parser(input);
  };
}
