/**
 * JSON File Product Store
 *
 * SOLID 원칙:
 * - SRP: 전체 상품 집합의 JSON 파일 저장/로드만 담당
 * - DIP: IProductStore 인터페이스 구현
 *
 * 저장 방식:
 * - 같은 디렉토리에 임시 파일 작성 → rename 으로 원자적 교체
 * - 실패 시 기존 파일은 그대로, 임시 파일은 삭제
 *
 * 로드 방식:
 * - 파일 없음 → 빈 목록 (에러 아님)
 * - JSON 파싱/스키마 검증 실패 → 빈 목록 + PERSISTENCE_ERROR (경고 로그)
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { Logger } from "@/config/logger";
import { COMPONENT_NAMES } from "@/config/constants";
import {
  StoredInventorySchema,
  buildInventoryDocument,
  summarizeIssues,
} from "@/core/domain/InventoryDocument";
import type { Product } from "@/core/domain/Product";
import type {
  IProductStore,
  StoreLoadResult,
  StoreSaveSummary,
} from "@/core/interfaces/IProductStore";
import { InventoryError } from "@/core/interfaces/InventoryErrorType";
import {
  type OperationResult,
  createErrorResult,
  createSuccessResult,
} from "@/core/interfaces/OperationResult";
import { createComponentLogger } from "@/utils/LoggerContext";
import { type Clock, systemClock, toIsoTimestamp } from "@/utils/timestamp";

export interface JsonFileProductStoreOptions {
  /** 저장 파일 경로 */
  filePath: string;
  clock?: Clock;
  logger?: Logger;
}

export class JsonFileProductStore implements IProductStore {
  private readonly filePath: string;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: JsonFileProductStoreOptions) {
    this.filePath = path.resolve(options.filePath);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createComponentLogger(COMPONENT_NAMES.STORE);
  }

  get path(): string {
    return this.filePath;
  }

  async save(
    records: readonly Product[],
  ): Promise<OperationResult<StoreSaveSummary>> {
    const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

    try {
      const document = buildInventoryDocument(
        records,
        toIsoTimestamp(this.clock()),
      );
      const content = JSON.stringify(document, null, 2) + "\n";

      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, content, "utf-8");
      await fs.rename(tempPath, this.filePath);

      this.logger.info(
        { filePath: this.filePath, count: records.length },
        "상품 목록 저장 완료",
      );
      return createSuccessResult({
        path: this.filePath,
        count: records.length,
      });
    } catch (error) {
      await this.removeTempFile(tempPath);

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        { error: message, filePath: this.filePath },
        "상품 목록 저장 실패",
      );
      return createErrorResult(
        InventoryError.persistence(
          `Failed to save inventory to ${this.filePath}: ${message}`,
          error,
        ),
      );
    }
  }

  async load(): Promise<StoreLoadResult> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.info(
          { filePath: this.filePath },
          "저장 파일 없음 - 빈 목록으로 시작",
        );
        return { records: [] };
      }
      return this.loadFailure("Failed to read inventory file", error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      return this.loadFailure("Inventory file is not valid JSON", error);
    }

    const parsed = StoredInventorySchema.safeParse(raw);
    if (!parsed.success) {
      return this.loadFailure(
        `Inventory file has invalid content: ${summarizeIssues(parsed.error)}`,
        parsed.error,
      );
    }

    this.logger.info(
      { filePath: this.filePath, count: parsed.data.length },
      "상품 목록 로드 완료",
    );
    return { records: parsed.data };
  }

  private loadFailure(reason: string, cause: unknown): StoreLoadResult {
    const error = InventoryError.persistence(
      `${reason} (${this.filePath})`,
      cause,
    );
    this.logger.warn(
      { ...error.toLogObject(), filePath: this.filePath },
      "저장 파일 로드 실패 - 빈 목록으로 시작",
    );
    return { records: [], error };
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.unlink(tempPath);
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.warn(
          { tempPath, error: error instanceof Error ? error.message : error },
          "임시 파일 삭제 실패",
        );
      }
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
