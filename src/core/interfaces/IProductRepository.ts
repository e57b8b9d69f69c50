/**
 * Product Repository 인터페이스
 *
 * SOLID 원칙:
 * - ISP: 저장 포맷/UI와 무관한 상품 집합 연산만 정의
 * - DIP: 세션/메뉴는 구체 구현(InMemoryProductRepository)에 의존하지 않음
 *
 * 조회 연산은 실패하지 않음 (미존재 → undefined / 빈 배열)
 * 변경 연산은 실패 시 상태를 바꾸지 않고 실패 결과 반환
 */

import type {
  CategorySummary,
  Product,
  ProductChanges,
} from "@/core/domain/Product";
import type { OperationResult } from "./OperationResult";

export interface IProductRepository {
  /**
   * 상품 생성 (id 부여, lastUpdated = 현재 시각)
   * @returns 생성된 상품 / INVALID_ARGUMENT
   */
  create(
    name: string,
    price: number,
    quantity: number,
    category: string,
  ): OperationResult<Product>;

  /**
   * 상품 삭제
   * @returns 실제로 삭제되었는지 여부
   */
  delete(id: number): boolean;

  findById(id: number): Product | undefined;

  /**
   * 이름 부분 일치 검색 (대소문자 무시, id 오름차순)
   */
  findByName(substring: string): Product[];

  /**
   * 카테고리 일치 검색 (대소문자 무시, id 오름차순)
   */
  findByCategory(category: string): Product[];

  /**
   * 재고 증감 (stockQuantity += delta, 결과는 0 이상의 안전한 정수)
   * @returns 변경된 상품 / NOT_FOUND / INVALID_ARGUMENT / INVALID_OPERATION
   */
  adjustStock(id: number, delta: number): OperationResult<Product>;

  /**
   * 이름/가격/카테고리 수정 (재고와 lastUpdated는 변경하지 않음)
   */
  update(id: number, changes: ProductChanges): OperationResult<Product>;

  /**
   * 전체 상품 (id 오름차순)
   */
  listAll(): Product[];

  /**
   * stockQuantity <= threshold 인 상품 (재고 오름차순, 동률은 id 오름차순)
   */
  listLowStock(threshold: number): Product[];

  /**
   * 카테고리별 집계 (카테고리명 오름차순)
   */
  listCategories(): CategorySummary[];

  /**
   * 전체 재고 가치 (Σ price × stockQuantity)
   */
  totalValue(): number;

  /**
   * 전체 상품 교체 (시작 시 1회)
   * 레코드 검증 실패(id 중복, 음수 재고 등) 시 기존 상태 유지
   * @returns 로드된 상품 수 / INVALID_ARGUMENT
   */
  loadFrom(records: readonly Product[]): OperationResult<number>;

  /**
   * 다음 create 가 부여할 id
   */
  nextId(): number;

  count(): number;
}
