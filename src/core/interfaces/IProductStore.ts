/**
 * Product Store 인터페이스 (영속화 어댑터)
 *
 * 전체 상품 집합을 한 번에 저장/로드
 * - 부분 저장 없음
 * - 실패는 throw 하지 않고 결과로 보고
 */

import type { Product } from "@/core/domain/Product";
import type { InventoryError } from "./InventoryErrorType";
import type { OperationResult } from "./OperationResult";

/**
 * 저장 결과
 */
export interface StoreSaveSummary {
  path: string;
  count: number;
}

/**
 * 로드 결과
 * - 파일 없음: records = [], error 없음
 * - 손상된 파일: records = [], error = PERSISTENCE_ERROR
 */
export interface StoreLoadResult {
  records: Product[];
  error?: InventoryError;
}

export interface IProductStore {
  save(records: readonly Product[]): Promise<OperationResult<StoreSaveSummary>>;
  load(): Promise<StoreLoadResult>;
}
