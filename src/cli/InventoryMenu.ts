/**
 * 대화형 텍스트 메뉴
 *
 * 세션 서비스 호출 + 결과 출력만 담당 (불변식 검사는 저장소 책임)
 * 입출력은 MenuIO 로 주입 → 테스트에서 스크립트 입력으로 구동 가능
 */

import type { Logger } from "@/config/logger";
import { COMPONENT_NAMES } from "@/config/constants";
import type { Product } from "@/core/domain/Product";
import type { OperationResult } from "@/core/interfaces/OperationResult";
import type { InventorySessionService } from "@/services/InventorySessionService";
import { createComponentLogger } from "@/utils/LoggerContext";
import {
  formatCategoryTable,
  formatError,
  formatMoney,
  formatProductDetail,
  formatProductTable,
} from "./formatters";
import {
  type InputParser,
  optional,
  parseAmount,
  parsePrice,
  parseProductId,
  parseQuantity,
  parseText,
} from "./inputParsers";

/**
 * 메뉴 입출력
 * ask 가 null 을 반환하면 입력 종료(EOF)로 간주
 */
export interface MenuIO {
  ask(prompt: string): Promise<string | null>;
  print(line: string): void;
}

interface MenuEntry {
  key: string;
  label: string;
  action: () => Promise<void>;
}

/**
 * 입력 종료 신호 (EOF)
 */
class InputClosed {}

export class InventoryMenu {
  private readonly entries: MenuEntry[];
  private readonly logger: Logger;

  constructor(
    private readonly session: InventorySessionService,
    private readonly io: MenuIO,
    logger?: Logger,
  ) {
    this.logger = logger ?? createComponentLogger(COMPONENT_NAMES.CLI);
    this.entries = [
      { key: "1", label: "전체 목록", action: () => this.listAll() },
      { key: "2", label: "상품 추가", action: () => this.addProduct() },
      { key: "3", label: "ID로 조회", action: () => this.showProduct() },
      { key: "4", label: "이름 검색", action: () => this.searchByName() },
      { key: "5", label: "카테고리 검색", action: () => this.searchByCategory() },
      { key: "6", label: "상품 수정", action: () => this.editProduct() },
      { key: "7", label: "입고", action: () => this.restock() },
      { key: "8", label: "판매", action: () => this.sell() },
      { key: "9", label: "재고 수량 지정", action: () => this.setStock() },
      { key: "10", label: "상품 삭제", action: () => this.deleteProduct() },
      { key: "11", label: "재고 부족 리포트", action: () => this.lowStock() },
      { key: "12", label: "재고 총액", action: () => this.inventoryValue() },
      { key: "13", label: "카테고리 요약", action: () => this.categorySummary() },
      { key: "14", label: "지금 저장", action: () => this.saveNow() },
    ];
  }

  /**
   * 메뉴 루프 (0 입력 또는 EOF 시 종료)
   */
  async run(): Promise<void> {
    while (true) {
      this.printMenu();
      const choice = await this.io.ask("선택> ");
      if (choice === null || choice.trim() === "0") {
        this.logger.info("메뉴 종료");
        return;
      }

      const entry = this.entries.find((e) => e.key === choice.trim());
      if (!entry) {
        this.io.print(`알 수 없는 메뉴입니다: ${choice.trim()}`);
        continue;
      }

      try {
        await entry.action();
      } catch (error) {
        if (error instanceof InputClosed) {
          this.logger.info("입력 종료로 메뉴 종료");
          return;
        }
        throw error;
      }
    }
  }

  private printMenu(): void {
    this.io.print("");
    this.io.print("==== 재고 관리 ====");
    for (const entry of this.entries) {
      this.io.print(`${entry.key.padStart(2)}. ${entry.label}`);
    }
    this.io.print(" 0. 종료");
  }

  /**
   * 유효한 값이 입력될 때까지 반복 질문
   */
  private async prompt<T>(question: string, parser: InputParser<T>): Promise<T> {
    while (true) {
      const answer = await this.io.ask(question);
      if (answer === null) {
        throw new InputClosed();
      }
      const parsed = parser(answer);
      if (parsed.ok) {
        return parsed.value;
      }
      this.io.print(`⚠️  ${parsed.message}`);
    }
  }

  private report(result: OperationResult<Product>, successMessage: string): void {
    if (result.success) {
      this.io.print(`✅ ${successMessage}`);
      this.io.print(`   ${formatProductDetail(result.data)}`);
    } else {
      this.io.print(formatError(result.error));
    }
  }

  private printProducts(products: readonly Product[]): void {
    for (const line of formatProductTable(products)) {
      this.io.print(line);
    }
  }

  private async listAll(): Promise<void> {
    this.printProducts(this.session.listProducts());
  }

  private async addProduct(): Promise<void> {
    const name = await this.prompt("상품명: ", parseText);
    const price = await this.prompt("가격: ", parsePrice);
    const quantity = await this.prompt("수량: ", parseQuantity);
    const category = await this.prompt("카테고리: ", parseText);

    const result = this.session.addProduct({ name, price, quantity, category });
    this.report(result, "상품이 추가되었습니다");
  }

  private async showProduct(): Promise<void> {
    const id = await this.prompt("상품 ID: ", parseProductId);
    const product = this.session.getProduct(id);
    this.io.print(
      product ? formatProductDetail(product) : `상품을 찾을 수 없습니다: #${id}`,
    );
  }

  private async searchByName(): Promise<void> {
    const query = await this.prompt("검색어: ", parseText);
    this.printProducts(this.session.searchByName(query));
  }

  private async searchByCategory(): Promise<void> {
    const category = await this.prompt("카테고리: ", parseText);
    this.printProducts(this.session.searchByCategory(category));
  }

  private async editProduct(): Promise<void> {
    const id = await this.prompt("상품 ID: ", parseProductId);
    const current = this.session.getProduct(id);
    if (!current) {
      this.io.print(`상품을 찾을 수 없습니다: #${id}`);
      return;
    }

    this.io.print(`   ${formatProductDetail(current)}`);
    this.io.print("   (빈 입력은 기존 값 유지)");
    const name = await this.prompt("새 상품명: ", optional(parseText));
    const price = await this.prompt("새 가격: ", optional(parsePrice));
    const category = await this.prompt("새 카테고리: ", optional(parseText));

    const result = this.session.editProduct(id, {
      ...(name !== undefined && { name }),
      ...(price !== undefined && { price }),
      ...(category !== undefined && { category }),
    });
    this.report(result, "상품이 수정되었습니다");
  }

  private async restock(): Promise<void> {
    const id = await this.prompt("상품 ID: ", parseProductId);
    const amount = await this.prompt("입고 수량: ", parseAmount);
    this.report(this.session.restock(id, amount), "입고 처리되었습니다");
  }

  private async sell(): Promise<void> {
    const id = await this.prompt("상품 ID: ", parseProductId);
    const amount = await this.prompt("판매 수량: ", parseAmount);
    this.report(this.session.sell(id, amount), "판매 처리되었습니다");
  }

  private async setStock(): Promise<void> {
    const id = await this.prompt("상품 ID: ", parseProductId);
    const target = await this.prompt("재고 수량: ", parseQuantity);
    this.report(this.session.setStock(id, target), "재고가 변경되었습니다");
  }

  private async deleteProduct(): Promise<void> {
    const id = await this.prompt("상품 ID: ", parseProductId);
    this.io.print(
      this.session.removeProduct(id)
        ? `✅ 상품 #${id} 삭제되었습니다`
        : `상품을 찾을 수 없습니다: #${id}`,
    );
  }

  private async lowStock(): Promise<void> {
    const threshold = await this.prompt(
      "임계값 (빈 입력 시 기본값): ",
      optional(parseQuantity),
    );
    const result = this.session.lowStock(threshold);
    if (!result.success) {
      this.io.print(formatError(result.error));
      return;
    }
    this.io.print(`재고 ${result.data.threshold}개 이하 상품:`);
    this.printProducts(result.data.products);
  }

  private async inventoryValue(): Promise<void> {
    this.io.print(`재고 총액: ${formatMoney(this.session.inventoryValue())}`);
  }

  private async categorySummary(): Promise<void> {
    for (const line of formatCategoryTable(this.session.categorySummary())) {
      this.io.print(line);
    }
  }

  private async saveNow(): Promise<void> {
    const result = await this.session.save();
    this.io.print(
      result.success
        ? `💾 ${result.data.count}개 상품 저장 완료 (${result.data.path})`
        : formatError(result.error),
    );
  }
}
