/**
 * JsonFileProductStore 테스트
 *
 * 목적: 전체 저장/로드 왕복, 손상 파일 처리, 저장 실패 시 원본 보존 검증
 * 각 테스트는 OS 임시 디렉토리 하위의 새 디렉토리 사용
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import pino from "pino";
import { JsonFileProductStore } from "@/repositories/JsonFileProductStore";
import { InventoryErrorType } from "@/core/interfaces/InventoryErrorType";
import type { Product } from "@/core/domain/Product";

const mockLogger = pino({ level: "silent" });
const fixedClock = () => new Date("2025-03-01T12:00:00.000Z");

const sampleProducts: Product[] = [
  {
    id: 1,
    name: "Wireless Mouse",
    price: 29.99,
    stockQuantity: 50,
    category: "Electronics",
    lastUpdated: "2025-01-15T09:00:00.000Z",
  },
  {
    id: 4,
    name: "Office Chair",
    price: 199.99,
    stockQuantity: 0,
    category: "Furniture",
    lastUpdated: "2025-02-20T18:45:10.250+09:00",
  },
];

describe("JsonFileProductStore", () => {
  let tempDir: string;
  let filePath: string;
  let store: JsonFileProductStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "inventory-store-"));
    filePath = path.join(tempDir, "inventory.json");
    store = new JsonFileProductStore({
      filePath,
      clock: fixedClock,
      logger: mockLogger,
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("load()", () => {
    it("파일이 없으면 에러 없이 빈 목록을 반환해야 함", async () => {
      const result = await store.load();

      expect(result).toEqual({ records: [] });
    });

    it("최상위 배열 포맷도 로드해야 함", async () => {
      await fs.writeFile(filePath, JSON.stringify(sampleProducts), "utf-8");

      const result = await store.load();

      expect(result.error).toBeUndefined();
      expect(result.records).toEqual(sampleProducts);
    });

    it("JSON이 아니면 빈 목록과 PERSISTENCE_ERROR를 반환해야 함", async () => {
      await fs.writeFile(filePath, "{ not json", "utf-8");

      const result = await store.load();

      expect(result.records).toEqual([]);
      expect(result.error?.type).toBe(InventoryErrorType.PERSISTENCE_ERROR);
    });

    it("스키마 위반(음수 재고)이면 빈 목록과 PERSISTENCE_ERROR를 반환해야 함", async () => {
      const broken = [{ ...sampleProducts[0], stockQuantity: -3 }];
      await fs.writeFile(filePath, JSON.stringify(broken), "utf-8");

      const result = await store.load();

      expect(result.records).toEqual([]);
      expect(result.error?.type).toBe(InventoryErrorType.PERSISTENCE_ERROR);
    });

    it("id가 중복되면 빈 목록과 PERSISTENCE_ERROR를 반환해야 함", async () => {
      const duplicated = [sampleProducts[0], { ...sampleProducts[1], id: 1 }];
      await fs.writeFile(filePath, JSON.stringify(duplicated), "utf-8");

      const result = await store.load();

      expect(result.records).toEqual([]);
      expect(result.error?.type).toBe(InventoryErrorType.PERSISTENCE_ERROR);
    });

    it("지원하지 않는 문서 버전이면 PERSISTENCE_ERROR", async () => {
      await fs.writeFile(
        filePath,
        JSON.stringify({
          version: 2,
          savedAt: "2025-03-01T12:00:00.000Z",
          products: sampleProducts,
        }),
        "utf-8",
      );

      const result = await store.load();

      expect(result.records).toEqual([]);
      expect(result.error?.type).toBe(InventoryErrorType.PERSISTENCE_ERROR);
    });
  });

  describe("save()", () => {
    it("저장 후 로드하면 필드 단위로 같은 목록이어야 함", async () => {
      const saved = await store.save(sampleProducts);
      const loaded = await store.load();

      expect(saved).toEqual({
        success: true,
        data: { path: filePath, count: 2 },
      });
      expect(loaded.error).toBeUndefined();
      expect(loaded.records).toEqual(sampleProducts);
    });

    it("version, savedAt, products 문서 포맷으로 저장해야 함", async () => {
      await store.save(sampleProducts);

      const content = await fs.readFile(filePath, "utf-8");

      expect(content.endsWith("}\n")).toBe(true);
      expect(JSON.parse(content)).toEqual({
        version: 1,
        savedAt: "2025-03-01T12:00:00.000Z",
        products: sampleProducts,
      });
    });

    it("빈 목록 저장 후 로드하면 빈 목록", async () => {
      await store.save([]);

      expect(await store.load()).toEqual({ records: [] });
    });

    it("상위 디렉토리가 없으면 생성해야 함", async () => {
      const nestedPath = path.join(tempDir, "nested", "deeper", "inventory.json");
      const nestedStore = new JsonFileProductStore({
        filePath: nestedPath,
        clock: fixedClock,
        logger: mockLogger,
      });

      const result = await nestedStore.save(sampleProducts);

      expect(result.success).toBe(true);
      expect((await nestedStore.load()).records).toEqual(sampleProducts);
    });

    it("매 저장마다 파일 전체를 교체해야 함", async () => {
      await store.save(sampleProducts);
      await store.save([sampleProducts[1]]);

      expect((await store.load()).records).toEqual([sampleProducts[1]]);
    });

    it("대상 경로가 디렉토리면 실패를 보고하고 임시 파일을 남기지 않아야 함", async () => {
      await fs.mkdir(filePath);
      await fs.writeFile(path.join(filePath, "keep.txt"), "keep", "utf-8");

      const result = await store.save(sampleProducts);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe(InventoryErrorType.PERSISTENCE_ERROR);
      }
      expect(await fs.readdir(tempDir)).toEqual(["inventory.json"]);
      expect(await fs.readFile(path.join(filePath, "keep.txt"), "utf-8")).toBe(
        "keep",
      );
    });

    it("상위 경로가 일반 파일이면 실패를 보고하고 그 파일을 건드리지 않아야 함", async () => {
      const blocker = path.join(tempDir, "blocker");
      await fs.writeFile(blocker, "original", "utf-8");
      const blockedStore = new JsonFileProductStore({
        filePath: path.join(blocker, "inventory.json"),
        clock: fixedClock,
        logger: mockLogger,
      });

      const result = await blockedStore.save(sampleProducts);

      expect(result.success).toBe(false);
      expect(await fs.readFile(blocker, "utf-8")).toBe("original");
    });

    it("이전 저장 파일이 있으면 실패한 저장 이후에도 그대로 남아야 함", async () => {
      await store.save(sampleProducts);
      const before = await fs.readFile(filePath, "utf-8");
      const invalid = [{ ...sampleProducts[0], price: 10n }];

      // BigInt는 JSON 직렬화 불가 → 저장 실패
      const result = await store.save(invalid as unknown as Product[]);

      expect(result.success).toBe(false);
      expect(await fs.readFile(filePath, "utf-8")).toBe(before);
      expect(await fs.readdir(tempDir)).toEqual(["inventory.json"]);
    });
  });
});
