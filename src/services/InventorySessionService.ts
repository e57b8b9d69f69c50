/**
 * Inventory Session Service
 *
 * SOLID 원칙:
 * - SRP: 한 세션의 로드 → 조작 → 저장 흐름만 담당
 * - DIP: IProductRepository / IProductStore 추상화에 의존
 *
 * 세션 규약:
 * - start() 에서 store.load() 결과로 repository.loadFrom() 1회 호출
 *   (레코드가 거부되면 빈 목록으로 시작하고 경고로 보고)
 * - 모든 재고 변경은 repository.adjustStock() 경유 (불변식 우회 금지)
 * - shutdown() 에서 store.save(repository.listAll())
 */

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { Logger } from "@/config/logger";
import type {
  CategorySummary,
  NewProductInput,
  Product,
  ProductChanges,
} from "@/core/domain/Product";
import type { IProductRepository } from "@/core/interfaces/IProductRepository";
import type {
  IProductStore,
  StoreSaveSummary,
} from "@/core/interfaces/IProductStore";
import {
  InventoryError,
  InventoryErrorType,
} from "@/core/interfaces/InventoryErrorType";
import {
  type OperationResult,
  createErrorResult,
  createSuccessResult,
} from "@/core/interfaces/OperationResult";
import { createSessionLogger } from "@/utils/LoggerContext";

/**
 * 수량 입력 스키마
 */
const PositiveAmountSchema = z.number().int().positive();
const TargetQuantitySchema = z.number().int().nonnegative();
const ThresholdSchema = z.number().int().nonnegative();

export interface InventorySessionOptions {
  repository: IProductRepository;
  store: IProductStore;
  /** threshold 생략 시 사용 */
  defaultLowStockThreshold: number;
  /** 로그 컨텍스트용 (저장 파일 경로) */
  dataFile: string;
  logger?: Logger;
}

/**
 * 세션 시작 결과
 */
export interface SessionStartSummary {
  loaded: number;
  nextId: number;
  /** 저장 파일이 손상되었거나 레코드가 거부되어 빈 목록으로 시작한 경우 */
  warning?: InventoryError;
}

/**
 * 재고 부족 리포트
 */
export interface LowStockReport {
  threshold: number;
  products: Product[];
}

export class InventorySessionService {
  readonly sessionId: string;
  private readonly repository: IProductRepository;
  private readonly store: IProductStore;
  private readonly defaultLowStockThreshold: number;
  private readonly logger: Logger;
  private startSummary: SessionStartSummary | null = null;

  constructor(options: InventorySessionOptions) {
    this.sessionId = uuidv4();
    this.repository = options.repository;
    this.store = options.store;
    this.defaultLowStockThreshold = ThresholdSchema.parse(
      options.defaultLowStockThreshold,
    );
    this.logger =
      options.logger ?? createSessionLogger(this.sessionId, options.dataFile);
  }

  /**
   * 저장 파일 로드 후 저장소 초기화 (두 번째 호출부터는 첫 결과 반환)
   */
  async start(): Promise<SessionStartSummary> {
    if (this.startSummary) {
      return this.startSummary;
    }

    const { records, error } = await this.store.load();
    const loadResult = this.repository.loadFrom(records);
    const loaded = loadResult.success ? loadResult.data : 0;
    const warning = error ?? (loadResult.success ? undefined : loadResult.error);

    this.startSummary = {
      loaded,
      nextId: this.repository.nextId(),
      ...(warning && { warning }),
    };

    this.logger.info({ loaded, degraded: Boolean(warning) }, "세션 시작");
    return this.startSummary;
  }

  addProduct(input: NewProductInput): OperationResult<Product> {
    return this.repository.create(
      input.name,
      input.price,
      input.quantity,
      input.category,
    );
  }

  removeProduct(id: number): boolean {
    return this.repository.delete(id);
  }

  getProduct(id: number): Product | undefined {
    return this.repository.findById(id);
  }

  searchByName(query: string): Product[] {
    return this.repository.findByName(query);
  }

  searchByCategory(category: string): Product[] {
    return this.repository.findByCategory(category);
  }

  listProducts(): Product[] {
    return this.repository.listAll();
  }

  editProduct(id: number, changes: ProductChanges): OperationResult<Product> {
    return this.repository.update(id, changes);
  }

  /**
   * 입고 (amount > 0)
   */
  restock(id: number, amount: number): OperationResult<Product> {
    if (!PositiveAmountSchema.safeParse(amount).success) {
      return invalidAmount("Restock amount", amount, id);
    }
    return this.repository.adjustStock(id, amount);
  }

  /**
   * 판매 (amount > 0)
   */
  sell(id: number, amount: number): OperationResult<Product> {
    if (!PositiveAmountSchema.safeParse(amount).success) {
      return invalidAmount("Sale amount", amount, id);
    }
    return this.repository.adjustStock(id, -amount);
  }

  /**
   * 재고 수량 직접 지정 (delta = target - current)
   */
  setStock(id: number, target: number): OperationResult<Product> {
    if (!TargetQuantitySchema.safeParse(target).success) {
      return createErrorResult(
        InventoryError.invalidArgument(
          `Stock quantity must be a non-negative integer (received ${target})`,
          id,
        ),
      );
    }

    const current = this.repository.findById(id);
    if (!current) {
      return createErrorResult(InventoryError.notFound(id));
    }
    return this.repository.adjustStock(id, target - current.stockQuantity);
  }

  /**
   * 재고 부족 리포트
   * - threshold 생략(undefined): 설정 기본값 사용
   * - threshold = 0: 품절 상품만 (기본값으로 대체하지 않음)
   */
  lowStock(threshold?: number): OperationResult<LowStockReport> {
    const effective = threshold ?? this.defaultLowStockThreshold;
    if (!ThresholdSchema.safeParse(effective).success) {
      return createErrorResult(
        InventoryError.invalidArgument(
          `Threshold must be a non-negative integer (received ${effective})`,
        ),
      );
    }
    return createSuccessResult({
      threshold: effective,
      products: this.repository.listLowStock(effective),
    });
  }

  inventoryValue(): number {
    return this.repository.totalValue();
  }

  categorySummary(): CategorySummary[] {
    return this.repository.listCategories();
  }

  /**
   * 현재 상태 저장 (세션 중 수동 저장 / 종료 시 저장 공용)
   * 실패해도 메모리 상태는 유지
   */
  async save(): Promise<OperationResult<StoreSaveSummary>> {
    const result = await this.store.save(this.repository.listAll());
    if (!result.success) {
      this.logger.error(result.error.toLogObject(), "세션 저장 실패");
    }
    return result;
  }

  async shutdown(): Promise<OperationResult<StoreSaveSummary>> {
    const result = await this.save();
    this.logger.info({ saved: result.success }, "세션 종료");
    return result;
  }
}

function invalidAmount(
  label: string,
  amount: number,
  id: number,
): OperationResult<Product> {
  return createErrorResult(
    new InventoryError(
      InventoryErrorType.INVALID_ARGUMENT,
      `${label} must be a positive integer (received ${amount})`,
      { productId: id },
    ),
  );
}
