/**
 * In-Memory Product Repository
 *
 * SOLID 원칙:
 * - SRP: 메모리 상의 상품 집합과 불변식만 담당 (저장 포맷/UI 모름)
 * - DIP: IProductRepository 인터페이스 구현
 *
 * 불변식:
 * - id는 세션 동안 유일, 단조 증가, 재사용 없음
 * - stockQuantity >= 0 (위반 시 전체 거부, 부분 적용 없음)
 * - lastUpdated는 생성 또는 마지막 재고 변경 시각
 *
 * 저장된 레코드는 Object.freeze 된 스냅샷이며, 변경 시 새 객체로 교체
 */

import type { Logger } from "@/config/logger";
import { COMPONENT_NAMES } from "@/config/constants";
import {
  type CategorySummary,
  type Product,
  type ProductChanges,
  centsToAmount,
  normalizePrice,
  stockValueInCents,
} from "@/core/domain/Product";
import {
  ProductListSchema,
  summarizeIssues,
} from "@/core/domain/InventoryDocument";
import type { IProductRepository } from "@/core/interfaces/IProductRepository";
import { InventoryError } from "@/core/interfaces/InventoryErrorType";
import {
  type OperationResult,
  createErrorResult,
  createSuccessResult,
} from "@/core/interfaces/OperationResult";
import { createComponentLogger } from "@/utils/LoggerContext";
import { type Clock, systemClock, toIsoTimestamp } from "@/utils/timestamp";

export interface InMemoryProductRepositoryOptions {
  /** 현재 시각 제공자 (기본: 시스템 시계) */
  clock?: Clock;
  logger?: Logger;
}

export class InMemoryProductRepository implements IProductRepository {
  private products = new Map<number, Product>();
  private nextIdValue = 1;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: InMemoryProductRepositoryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger =
      options.logger ?? createComponentLogger(COMPONENT_NAMES.REPOSITORY);
  }

  create(
    name: string,
    price: number,
    quantity: number,
    category: string,
  ): OperationResult<Product> {
    const invalid =
      validateName(name) ??
      validatePrice(price) ??
      validateQuantity(quantity) ??
      validateCategory(category);
    if (invalid) {
      this.logger.debug({ reason: invalid }, "상품 생성 거부");
      return createErrorResult(InventoryError.invalidArgument(invalid));
    }

    const product: Product = Object.freeze({
      id: this.nextIdValue,
      name: name.trim(),
      price: normalizePrice(price),
      stockQuantity: quantity,
      category: category.trim(),
      lastUpdated: this.now(),
    });

    this.products.set(product.id, product);
    this.nextIdValue += 1;

    this.logger.info(
      { productId: product.id, name: product.name },
      "상품 생성",
    );
    return createSuccessResult(product);
  }

  delete(id: number): boolean {
    const removed = this.products.delete(id);
    if (removed) {
      this.logger.info({ productId: id }, "상품 삭제");
    }
    return removed;
  }

  findById(id: number): Product | undefined {
    return this.products.get(id);
  }

  findByName(substring: string): Product[] {
    const needle = substring.trim().toLowerCase();
    if (!needle) {
      return [];
    }
    return this.listAll().filter((product) =>
      product.name.toLowerCase().includes(needle),
    );
  }

  findByCategory(category: string): Product[] {
    const target = category.trim().toLowerCase();
    if (!target) {
      return [];
    }
    return this.listAll().filter(
      (product) => product.category.toLowerCase() === target,
    );
  }

  adjustStock(id: number, delta: number): OperationResult<Product> {
    const current = this.products.get(id);
    if (!current) {
      return createErrorResult(InventoryError.notFound(id));
    }
    if (!Number.isSafeInteger(delta)) {
      return createErrorResult(
        InventoryError.invalidArgument(
          `Stock delta must be an integer (received ${delta})`,
          id,
        ),
      );
    }

    const nextQuantity = current.stockQuantity + delta;
    if (nextQuantity < 0) {
      this.logger.warn(
        { productId: id, stockQuantity: current.stockQuantity, delta },
        "재고 부족으로 변경 거부",
      );
      return createErrorResult(
        InventoryError.invalidOperation(
          `Insufficient stock for product ${id}: ${current.stockQuantity} available, change of ${delta} requested`,
          id,
        ),
      );
    }
    if (!Number.isSafeInteger(nextQuantity)) {
      return createErrorResult(
        InventoryError.invalidArgument(
          `Stock quantity would exceed ${Number.MAX_SAFE_INTEGER} for product ${id}`,
          id,
        ),
      );
    }

    const updated: Product = Object.freeze({
      ...current,
      stockQuantity: nextQuantity,
      lastUpdated: this.now(current.lastUpdated),
    });
    this.products.set(id, updated);

    this.logger.info(
      { productId: id, delta, stockQuantity: nextQuantity },
      "재고 변경",
    );
    return createSuccessResult(updated);
  }

  update(id: number, changes: ProductChanges): OperationResult<Product> {
    const current = this.products.get(id);
    if (!current) {
      return createErrorResult(InventoryError.notFound(id));
    }

    const invalid =
      (changes.name !== undefined ? validateName(changes.name) : undefined) ??
      (changes.price !== undefined
        ? validatePrice(changes.price)
        : undefined) ??
      (changes.category !== undefined
        ? validateCategory(changes.category)
        : undefined);
    if (invalid) {
      return createErrorResult(InventoryError.invalidArgument(invalid, id));
    }

    const updated: Product = Object.freeze({
      ...current,
      ...(changes.name !== undefined && { name: changes.name.trim() }),
      ...(changes.price !== undefined && {
        price: normalizePrice(changes.price),
      }),
      ...(changes.category !== undefined && {
        category: changes.category.trim(),
      }),
    });
    this.products.set(id, updated);

    this.logger.info(
      { productId: id, fields: Object.keys(changes) },
      "상품 수정",
    );
    return createSuccessResult(updated);
  }

  listAll(): Product[] {
    return [...this.products.values()].sort((a, b) => a.id - b.id);
  }

  listLowStock(threshold: number): Product[] {
    return [...this.products.values()]
      .filter((product) => product.stockQuantity <= threshold)
      .sort((a, b) => a.stockQuantity - b.stockQuantity || a.id - b.id);
  }

  listCategories(): CategorySummary[] {
    const groups = new Map<
      string,
      { productCount: number; totalUnits: number; valueInCents: bigint }
    >();

    for (const product of this.products.values()) {
      const group = groups.get(product.category) ?? {
        productCount: 0,
        totalUnits: 0,
        valueInCents: 0n,
      };
      group.productCount += 1;
      group.totalUnits += product.stockQuantity;
      group.valueInCents += stockValueInCents(product);
      groups.set(product.category, group);
    }

    return [...groups.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([category, group]) => ({
        category,
        productCount: group.productCount,
        totalUnits: group.totalUnits,
        totalValue: centsToAmount(group.valueInCents),
      }));
  }

  totalValue(): number {
    let cents = 0n;
    for (const product of this.products.values()) {
      cents += stockValueInCents(product);
    }
    return centsToAmount(cents);
  }

  loadFrom(records: readonly Product[]): OperationResult<number> {
    const parsed = ProductListSchema.safeParse(records);
    if (!parsed.success) {
      const error = InventoryError.invalidArgument(
        `Rejected product records: ${summarizeIssues(parsed.error)}`,
      );
      this.logger.warn(error.toLogObject(), "상품 목록 로드 거부");
      return createErrorResult(error);
    }

    const products = new Map<number, Product>();
    let maxId = 0;
    for (const record of parsed.data) {
      products.set(record.id, Object.freeze({ ...record }));
      maxId = Math.max(maxId, record.id);
    }

    this.products = products;
    this.nextIdValue = maxId + 1;

    this.logger.info(
      { count: products.size, nextId: this.nextIdValue },
      "상품 목록 로드",
    );
    return createSuccessResult(products.size);
  }

  nextId(): number {
    return this.nextIdValue;
  }

  count(): number {
    return this.products.size;
  }

  /**
   * 현재 시각 (ISO). previous 보다 이른 값은 반환하지 않음 (시계 역행 대비)
   */
  private now(previous?: string): string {
    const now = toIsoTimestamp(this.clock());
    if (previous && Date.parse(previous) > Date.parse(now)) {
      return previous;
    }
    return now;
  }
}

function validateName(name: string): string | undefined {
  return name.trim() ? undefined : "Product name must not be empty";
}

function validateCategory(category: string): string | undefined {
  return category.trim() ? undefined : "Category must not be empty";
}

function validatePrice(price: number): string | undefined {
  if (!Number.isFinite(price) || price < 0) {
    return `Price must be a non-negative number (received ${price})`;
  }
  return undefined;
}

function validateQuantity(quantity: number): string | undefined {
  if (!Number.isSafeInteger(quantity) || quantity < 0) {
    return `Quantity must be a non-negative integer (received ${quantity})`;
  }
  return undefined;
}
