/**
 * 저장 파일 문서 포맷
 *
 * {
 *   "version": 1,
 *   "savedAt": "2025-01-01T00:00:00.000Z",
 *   "products": [ ... ]
 * }
 *
 * 하위 호환: 최상위가 상품 배열인 파일도 로드 허용
 */

import { z } from "zod";
import { ProductSchema, type Product } from "./Product";

export const INVENTORY_DOCUMENT_VERSION = 1;

/**
 * 상품 배열 스키마 (id 중복 금지)
 */
export const ProductListSchema = z
  .array(ProductSchema)
  .superRefine((products, ctx) => {
    const seen = new Set<number>();
    products.forEach((product, index) => {
      if (seen.has(product.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate product id ${product.id}`,
          path: [index, "id"],
        });
      }
      seen.add(product.id);
    });
  });

export const InventoryDocumentSchema = z.object({
  version: z.literal(INVENTORY_DOCUMENT_VERSION),
  savedAt: z.string().datetime({ offset: true }),
  products: ProductListSchema,
});

export type InventoryDocument = z.infer<typeof InventoryDocumentSchema>;

/**
 * 파싱된 JSON 값을 상품 목록으로 변환
 * - 문서 포맷 또는 상품 배열 모두 허용
 */
export const StoredInventorySchema = z.union([
  InventoryDocumentSchema.transform((doc) => doc.products),
  ProductListSchema,
]);

/**
 * Zod 이슈 요약 (첫 3개)
 */
export function summarizeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

/**
 * 저장용 문서 생성
 */
export function buildInventoryDocument(
  products: readonly Product[],
  savedAt: string,
): InventoryDocument {
  return {
    version: INVENTORY_DOCUMENT_VERSION,
    savedAt,
    products: products.map((product) => ({
      id: product.id,
      name: product.name,
      price: product.price,
      stockQuantity: product.stockQuantity,
      category: product.category,
      lastUpdated: product.lastUpdated,
    })),
  };
}
