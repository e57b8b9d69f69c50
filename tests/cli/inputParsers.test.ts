import { describe, it, expect } from "@jest/globals";
import {
  optional,
  parseAmount,
  parsePrice,
  parseProductId,
  parseQuantity,
  parseText,
} from "@/cli/inputParsers";

describe("inputParsers", () => {
  describe("parseProductId", () => {
    it("앞뒤 공백을 허용하고 정수로 변환해야 함", () => {
      expect(parseProductId(" 7 ")).toEqual({ ok: true, value: 7 });
    });

    it.each([
      ["0", "id는 1 이상입니다"],
      ["-4", "id는 1 이상입니다"],
      ["abc", "정수를 입력하세요"],
      ["1.5", "정수를 입력하세요"],
      ["", "정수를 입력하세요"],
      ["99999999999999999999", "숫자가 너무 큽니다"],
    ])("%p → %s", (input, message) => {
      expect(parseProductId(input)).toEqual({ ok: false, message });
    });
  });

  describe("parseQuantity / parseAmount", () => {
    it("수량은 0을 허용해야 함", () => {
      expect(parseQuantity("0")).toEqual({ ok: true, value: 0 });
      expect(parseQuantity("-1")).toEqual({
        ok: false,
        message: "수량은 0 이상입니다",
      });
    });

    it("입고/판매 수량은 1 이상이어야 함", () => {
      expect(parseAmount("3")).toEqual({ ok: true, value: 3 });
      expect(parseAmount("0")).toEqual({
        ok: false,
        message: "수량은 1 이상입니다",
      });
    });
  });

  describe("parsePrice", () => {
    it.each([
      { input: "19.99", value: 19.99 },
      { input: "5", value: 5 },
      { input: "0.5", value: 0.5 },
      { input: " 12.30 ", value: 12.3 },
    ])("$input → $value", ({ input, value }) => {
      expect(parsePrice(input)).toEqual({ ok: true, value });
    });

    it.each(["-1", "1.999", "abc", "", "1e3"])("%p 는 거부해야 함", (input) => {
      expect(parsePrice(input)).toEqual({
        ok: false,
        message: "0 이상의 가격을 소수 둘째 자리까지 입력하세요",
      });
    });
  });

  describe("parseText", () => {
    it("앞뒤 공백을 제거해야 함", () => {
      expect(parseText("  Desk Lamp  ")).toEqual({ ok: true, value: "Desk Lamp" });
    });

    it("공백만 있으면 거부해야 함", () => {
      expect(parseText("   ")).toEqual({
        ok: false,
        message: "빈 값은 입력할 수 없습니다",
      });
    });
  });

  describe("optional", () => {
    const parseThreshold = optional(parseQuantity);

    it("빈 입력은 값 없음(undefined)", () => {
      expect(parseThreshold("")).toEqual({ ok: true, value: undefined });
      expect(parseThreshold("  ")).toEqual({ ok: true, value: undefined });
    });

    it("0은 값 없음과 구분되어야 함", () => {
      expect(parseThreshold("0")).toEqual({ ok: true, value: 0 });
    });

    it("빈 입력이 아니면 내부 파서 결과를 그대로 반환", () => {
      expect(parseThreshold("x")).toEqual({
        ok: false,
        message: "정수를 입력하세요",
      });
    });
  });
});
