/**
 * 로거 컨텍스트 유틸리티
 *
 * 컴포넌트별 자식 로거 생성 헬퍼
 */

import { logger, Logger } from "@/config/logger";
import { COMPONENT_NAMES, type ComponentName } from "@/config/constants";

/**
 * 컴포넌트 전용 로거 생성
 * @param component - 컴포넌트 이름 (repository, store, session, cli)
 */
export function createComponentLogger(component: ComponentName): Logger {
  return logger.child({ component });
}

/**
 * 세션 전용 로거 생성
 * @param sessionId - 세션 ID
 * @param dataFile - 저장 파일 경로
 */
export function createSessionLogger(
  sessionId: string,
  dataFile: string,
): Logger {
  return logger.child({
    component: COMPONENT_NAMES.SESSION,
    session_id: sessionId,
    data_file: dataFile,
  });
}
