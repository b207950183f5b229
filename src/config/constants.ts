/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 타입 안전성 보장
 */

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 version 필드와 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",

  NAME: "Product Catalog",
} as const;

/**
 * 데이터베이스 설정
 */
export const DATABASE_CONFIG = {
  /**
   * Products 테이블명
   * 환경변수: PRODUCTS_TABLE_NAME
   * 기본값: "products"
   */
  PRODUCTS_TABLE_NAME: process.env.PRODUCTS_TABLE_NAME || "products",
} as const;

/**
 * Repository 설정
 */
export const REPOSITORY_CONFIG = {
  /**
   * Pagination 페이지 크기
   * 환경변수: PAGINATION_PAGE_SIZE
   * 기본값: 1000 (PostgREST max-rows 기본값)
   */
  PAGINATION_PAGE_SIZE: Number(process.env.PAGINATION_PAGE_SIZE) || 1000,

  /**
   * 기본 SELECT 필드 목록
   */
  DEFAULT_PRODUCT_FIELDS: [
    "id",
    "product_code",
    "product_name",
    "description",
    "price",
    "quantity",
    "origin_country",
  ] as const,
} as const;

/**
 * 상품 필드 검증 규칙
 */
export const PRODUCT_RULES = {
  PRODUCT_CODE_MAX_LENGTH: 10,
  PRODUCT_NAME_MAX_LENGTH: 50,
  DESCRIPTION_MAX_LENGTH: 255,
  ORIGIN_COUNTRY_MAX_LENGTH: 50,
} as const;
