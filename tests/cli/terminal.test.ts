/**
 * createTerminalIO 테스트
 *
 * PassThrough 스트림으로 파이프 입력(여러 줄이 한 번에 도착)을 재현
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { PassThrough } from "stream";
import { createTerminalIO, type TerminalIO } from "@/cli/terminal";

const nextTick = () => new Promise((resolve) => setImmediate(resolve));

describe("createTerminalIO", () => {
  let input: PassThrough;
  let output: PassThrough;
  let written: string[];
  let io: TerminalIO;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    written = [];
    output.on("data", (chunk: Buffer) => written.push(chunk.toString()));
    io = createTerminalIO(input, output);
  });

  afterEach(() => {
    io.close();
  });

  it("한 번에 들어온 여러 줄을 순서대로 하나씩 반환해야 함", async () => {
    input.end("2\nLamp\n12.50\n3\nHome\n0\n");

    const answers: Array<string | null> = [];
    for (let i = 0; i < 7; i += 1) {
      answers.push(await io.ask("> "));
    }

    expect(answers).toEqual(["2", "Lamp", "12.50", "3", "Home", "0", null]);
  });

  it("입력보다 먼저 기다리던 ask도 도착한 줄을 받아야 함", async () => {
    const pending = io.ask("선택> ");
    input.write("14\n");

    expect(await pending).toBe("14");
  });

  it("입력이 닫힌 뒤에는 계속 null을 반환해야 함", async () => {
    const pending = io.ask("선택> ");
    input.end();

    expect(await pending).toBeNull();
    expect(await io.ask("선택> ")).toBeNull();
  });

  it("프롬프트와 출력 라인을 순서대로 기록해야 함", async () => {
    input.write("1\n");
    await io.ask("선택> ");
    io.print("(상품 없음)");
    await nextTick();

    expect(written.join("")).toBe("선택> (상품 없음)\n");
  });
});
