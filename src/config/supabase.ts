/**
 * Supabase 클라이언트 팩토리
 *
 * Repository에 주입할 클라이언트를 생성한다.
 * 서버 환경이므로 세션 저장/자동 갱신은 비활성화.
 */

import "dotenv/config";
import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { logger } from "@/config/logger";

export interface SupabaseEnv {
  SUPABASE_URL?: string;
  SUPABASE_SERVICE_ROLE_KEY?: string;
}

export interface SupabaseClientFactoryOptions {
  /** PostgREST 요청에 사용할 fetch 구현 (기본값: 전역 fetch) */
  fetch?: typeof fetch;
}

/**
 * 환경변수로부터 Supabase 클라이언트 생성
 *
 * @param env 환경변수 (기본값: process.env)
 * @param options fetch 교체 등 클라이언트 옵션
 */
export function createSupabaseClient(
  env: SupabaseEnv = process.env,
  options: SupabaseClientFactoryOptions = {},
): SupabaseClient {
  const supabaseUrl = env.SUPABASE_URL;
  const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY;

  if (!supabaseUrl || !supabaseKey) {
    throw new Error(
      "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in environment variables",
    );
  }

  const client = createClient(supabaseUrl, supabaseKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
  logger.debug({ url: supabaseUrl }, "Supabase client 초기화 완료");

  return client;
}
