import { describe, it, expect } from "@jest/globals";
import * as path from "path";
import {
  INVENTORY_DEFAULTS,
  loadInventoryConfig,
} from "@/config/constants";

describe("loadInventoryConfig", () => {
  it("환경변수가 없으면 기본값을 사용해야 함", () => {
    expect(loadInventoryConfig({})).toEqual({
      dataFile: path.resolve(INVENTORY_DEFAULTS.DATA_FILE),
      lowStockThreshold: 5,
    });
  });

  it("빈 문자열은 미설정으로 취급해야 함", () => {
    expect(
      loadInventoryConfig({ INVENTORY_DATA_FILE: "", LOW_STOCK_THRESHOLD: "" }),
    ).toEqual({
      dataFile: path.resolve(INVENTORY_DEFAULTS.DATA_FILE),
      lowStockThreshold: 5,
    });
  });

  it("환경변수로 경로와 임계값을 지정할 수 있어야 함", () => {
    expect(
      loadInventoryConfig({
        INVENTORY_DATA_FILE: "/var/lib/inventory/items.json",
        LOW_STOCK_THRESHOLD: "0",
      }),
    ).toEqual({
      dataFile: "/var/lib/inventory/items.json",
      lowStockThreshold: 0,
    });
  });

  it("상대 경로는 절대 경로로 변환해야 함", () => {
    const config = loadInventoryConfig({ INVENTORY_DATA_FILE: "store.json" });

    expect(config.dataFile).toBe(path.resolve("store.json"));
  });

  it.each(["abc", "-2", "1.5"])("잘못된 임계값 %p 는 에러", (value) => {
    expect(() => loadInventoryConfig({ LOW_STOCK_THRESHOLD: value })).toThrow();
  });
});
