/**
 * 메뉴 출력 포맷터
 */

import type { CategorySummary, Product } from "@/core/domain/Product";
import {
  type InventoryError,
  InventoryErrorType,
} from "@/core/interfaces/InventoryErrorType";

const COLUMN_GAP = "  ";

const PRODUCT_COLUMNS = {
  id: 4,
  name: 24,
  category: 16,
  price: 10,
  stock: 7,
} as const;

/**
 * 금액 표시 (소수 둘째 자리 고정)
 */
export function formatMoney(amount: number): string {
  return amount.toFixed(2);
}

/**
 * 최대 길이를 넘는 문자열은 말줄임
 */
function fit(text: string, width: number): string {
  if (text.length <= width) {
    return text.padEnd(width);
  }
  return text.slice(0, width - 1) + "…";
}

export function formatProductHeader(): string {
  return [
    "ID".padEnd(PRODUCT_COLUMNS.id),
    "Name".padEnd(PRODUCT_COLUMNS.name),
    "Category".padEnd(PRODUCT_COLUMNS.category),
    "Price".padStart(PRODUCT_COLUMNS.price),
    "Stock".padStart(PRODUCT_COLUMNS.stock),
    "Last Updated",
  ].join(COLUMN_GAP);
}

export function formatProductRow(product: Product): string {
  return [
    String(product.id).padEnd(PRODUCT_COLUMNS.id),
    fit(product.name, PRODUCT_COLUMNS.name),
    fit(product.category, PRODUCT_COLUMNS.category),
    formatMoney(product.price).padStart(PRODUCT_COLUMNS.price),
    String(product.stockQuantity).padStart(PRODUCT_COLUMNS.stock),
    product.lastUpdated,
  ].join(COLUMN_GAP);
}

/**
 * 상품 표 (헤더 + 구분선 + 행)
 */
export function formatProductTable(products: readonly Product[]): string[] {
  if (products.length === 0) {
    return ["(상품 없음)"];
  }
  const header = formatProductHeader();
  return [header, "-".repeat(header.length), ...products.map(formatProductRow)];
}

/**
 * 상품 상세 (한 줄)
 */
export function formatProductDetail(product: Product): string {
  return `#${product.id} ${product.name} [${product.category}] ${formatMoney(product.price)} x ${product.stockQuantity} (updated ${product.lastUpdated})`;
}

export function formatCategoryTable(
  summaries: readonly CategorySummary[],
): string[] {
  if (summaries.length === 0) {
    return ["(카테고리 없음)"];
  }
  return summaries.map(
    (summary) =>
      `${fit(summary.category, PRODUCT_COLUMNS.category)}${COLUMN_GAP}${String(summary.productCount).padStart(4)} items${COLUMN_GAP}${String(summary.totalUnits).padStart(7)} units${COLUMN_GAP}${formatMoney(summary.totalValue).padStart(12)}`,
  );
}

const ERROR_LABELS: Record<InventoryErrorType, string> = {
  [InventoryErrorType.INVALID_ARGUMENT]: "입력 오류",
  [InventoryErrorType.INVALID_OPERATION]: "처리 불가",
  [InventoryErrorType.NOT_FOUND]: "상품 없음",
  [InventoryErrorType.PERSISTENCE_ERROR]: "저장 오류",
};

export function formatError(error: InventoryError): string {
  return `❌ ${ERROR_LABELS[error.type]}: ${error.message}`;
}
