/**
 * readline 기반 터미널 입출력 (MenuIO 구현)
 *
 * 입력 라인은 도착 즉시 큐에 쌓고 ask 가 순서대로 꺼냄
 * (파이프/리다이렉트로 여러 줄이 한 번에 들어와도 유실 없음)
 * 큐가 비어 있고 입력이 닫힌 경우에만 null (EOF)
 */

import * as readline from "readline";
import type { MenuIO } from "./InventoryMenu";

export interface TerminalIO extends MenuIO {
  close(): void;
}

export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): TerminalIO {
  const rl = readline.createInterface({ input, output });
  const pendingLines: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on("line", (line) => {
    const resolve = waiting.shift();
    if (resolve) {
      resolve(line);
    } else {
      pendingLines.push(line);
    }
  });
  rl.on("close", () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });
  // Ctrl+C → 입력 종료로 처리 (메뉴 종료 후 저장 흐름 유지)
  rl.on("SIGINT", () => rl.close());

  return {
    ask(prompt: string): Promise<string | null> {
      if (closed) {
        output.write(prompt);
      } else {
        rl.setPrompt(prompt);
        rl.prompt();
      }

      const queued = pendingLines.shift();
      if (queued !== undefined) {
        return Promise.resolve(queued);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    print(line: string): void {
      output.write(line + "\n");
    },
    close(): void {
      if (!closed) {
        rl.close();
      }
    },
  };
}
