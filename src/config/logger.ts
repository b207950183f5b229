/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 콘솔 출력:
 * - LOG_LEVEL 이상 JSON 포맷으로 stdout 출력
 * - NODE_ENV=test 에서는 기본 silent
 *
 * 파일 출력 (LOG_TO_FILE=true 인 경우):
 * - LOG_DIR/YYYY-MM-DD/{SERVICE_NAME}.log
 * - 일일 로테이션, 90일 보관
 */

import pino from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getDateDir, getTimestampWithTimezone } from "@/utils/timestamp";
import { APP_METADATA } from "@/config/constants";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test"
    ? "silent"
    : NODE_ENV === "production"
      ? "info"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "catalog";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string) {
  return createStream(
    () => {
      const dateDir = getDateDir();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 90,
      maxSize: "100M",
    },
  );
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: APP_METADATA.NAME,
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

function createLogger(): pino.Logger {
  if (!LOG_TO_FILE) {
    return pino(baseConfig);
  }

  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }

  const streams: pino.StreamEntry[] = [
    { level: "debug", stream: process.stdout },
    { level: "debug", stream: createRotatingStream(SERVICE_NAME) },
  ];

  return pino(baseConfig, pino.multistream(streams));
}

/**
 * 메인 로거 인스턴스
 */
export const logger = createLogger();

export type Logger = pino.Logger;
