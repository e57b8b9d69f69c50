/**
 * Inventory Error Type Enum
 *
 * 목적:
 * - 실패 원인 세분화 (입력 오류 / 재고 불변식 위반 / 미존재 / 저장 실패)
 * - 에러별 로깅 및 메뉴 메시지 차별화
 *
 * SOLID 원칙:
 * - SRP: 에러 타입 정의만 담당
 * - OCP: 새로운 에러 타입 추가 가능
 */

/**
 * Inventory 에러 타입
 */
export enum InventoryErrorType {
  /** 잘못된 입력값 (음수 가격, 음수 수량, 빈 이름 등) */
  INVALID_ARGUMENT = "INVALID_ARGUMENT",

  /** 재고가 음수가 되는 변경 */
  INVALID_OPERATION = "INVALID_OPERATION",

  /** id로 상품을 찾지 못함 */
  NOT_FOUND = "NOT_FOUND",

  /** 저장 파일 읽기/쓰기 실패 */
  PERSISTENCE_ERROR = "PERSISTENCE_ERROR",
}

/**
 * Inventory Error 클래스
 */
export class InventoryError extends Error {
  public readonly type: InventoryErrorType;
  public readonly productId?: number;
  public readonly errorCause?: unknown;

  constructor(
    type: InventoryErrorType,
    message: string,
    options?: {
      productId?: number;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "InventoryError";
    this.type = type;
    this.productId = options?.productId;
    this.errorCause = options?.cause;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      productId: this.productId,
      cause:
        this.errorCause instanceof Error
          ? this.errorCause.message
          : this.errorCause,
    };
  }

  static invalidArgument(message: string, productId?: number): InventoryError {
    return new InventoryError(InventoryErrorType.INVALID_ARGUMENT, message, {
      productId,
    });
  }

  static invalidOperation(message: string, productId: number): InventoryError {
    return new InventoryError(InventoryErrorType.INVALID_OPERATION, message, {
      productId,
    });
  }

  static notFound(productId: number): InventoryError {
    return new InventoryError(
      InventoryErrorType.NOT_FOUND,
      `Product ${productId} not found`,
      { productId },
    );
  }

  static persistence(message: string, cause?: unknown): InventoryError {
    return new InventoryError(InventoryErrorType.PERSISTENCE_ERROR, message, {
      cause,
    });
  }
}
