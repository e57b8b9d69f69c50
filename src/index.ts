#!/usr/bin/env node
/**
 * 재고 관리 CLI 진입점
 *
 * 흐름:
 *   설정 로드 → store.load() → repository.loadFrom() → 메뉴 → store.save(listAll())
 *
 * 사용법:
 *   npm start
 *   INVENTORY_DATA_FILE=./my-inventory.json npm start
 */

import { config } from "dotenv";
config();

import { APP_METADATA, loadInventoryConfig } from "@/config/constants";
import { logger } from "@/config/logger";
import { InventoryMenu } from "@/cli/InventoryMenu";
import { formatError } from "@/cli/formatters";
import { createTerminalIO } from "@/cli/terminal";
import { InMemoryProductRepository } from "@/repositories/InMemoryProductRepository";
import { JsonFileProductStore } from "@/repositories/JsonFileProductStore";
import { InventorySessionService } from "@/services/InventorySessionService";

async function main(): Promise<number> {
  const inventoryConfig = loadInventoryConfig();
  const io = createTerminalIO();

  const session = new InventorySessionService({
    repository: new InMemoryProductRepository(),
    store: new JsonFileProductStore({ filePath: inventoryConfig.dataFile }),
    defaultLowStockThreshold: inventoryConfig.lowStockThreshold,
    dataFile: inventoryConfig.dataFile,
  });

  io.print(`📦 ${APP_METADATA.NAME} v${APP_METADATA.VERSION}`);
  const summary = await session.start();
  if (summary.warning) {
    io.print(formatError(summary.warning));
    io.print("   빈 목록으로 시작합니다. 저장 시 기존 파일을 덮어씁니다.");
  }
  io.print(`   ${summary.loaded}개 상품 로드 (${inventoryConfig.dataFile})`);

  await new InventoryMenu(session, io).run();

  const saved = await session.shutdown();
  io.close();
  if (!saved.success) {
    io.print(formatError(saved.error));
    return 1;
  }
  io.print(`💾 ${saved.data.count}개 상품 저장 완료`);
  return 0;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal(
      { error: error instanceof Error ? error.message : String(error) },
      "처리되지 않은 오류",
    );
    console.error(error);
    process.exitCode = 1;
  });
