/**
 * Operation Result
 *
 * 예상 가능한 실패(미존재, 불변식 위반, 저장 실패)는 throw 하지 않고
 * 결과 객체로 반환
 *
 * 사용 패턴:
 * - 성공 시: { success: true, data: T }
 * - 실패 시: { success: false, error: InventoryError }
 */

import { InventoryError } from "./InventoryErrorType";

export type OperationResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: InventoryError };

/**
 * 성공 결과 생성 헬퍼
 */
export function createSuccessResult<T>(data: T): OperationResult<T> {
  return { success: true, data };
}

/**
 * 실패 결과 생성 헬퍼
 */
export function createErrorResult<T>(
  error: InventoryError,
): OperationResult<T> {
  return { success: false, error };
}
