/**
 * Products Manager 에러 타입
 *
 * 목적:
 * - 실패 원인 분류 (검증 / 인자 / 조회 결과 없음)
 * - 호출자가 메시지 문자열이 아닌 태그로 분기 가능
 *
 * Note: 메시지 문자열은 기존 클라이언트 호환을 위해 고정값 유지
 * ("Invalid prduct!" 오타 포함)
 */

import type { ZodIssue } from "zod";

/**
 * 에러 분류
 */
export enum ProductsErrorType {
  /** 필드 값 검증 실패 (음수 가격, 빈 필수값 등) */
  VALIDATION = "VALIDATION",

  /** 필수 인자 누락 (빈 상품 코드) */
  ARGUMENT = "ARGUMENT",

  /** 조회 결과 없음 */
  NOT_FOUND = "NOT_FOUND",
}

/**
 * 고정 에러 메시지
 */
export const PRODUCT_ERROR_MESSAGES = {
  INVALID_PRODUCT_ON_ADD: "Invalid product!",
  INVALID_PRODUCT_ON_UPDATE: "Invalid prduct!",
  EMPTY_PRODUCT_CODE: "Product code cannot be empty.",
  NO_PRODUCTS: "No product found.",
  NO_PRODUCTS_FOR_COUNTRY: "No product found with the given first name.",
  noProductWithCode: (code: string) =>
    `No product found with product code: ${code}`,
} as const;

/**
 * Manager 에러 기본 클래스
 */
export abstract class ProductsManagerError extends Error {
  abstract readonly type: ProductsErrorType;

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
    };
  }
}

export class ProductValidationError extends ProductsManagerError {
  readonly type = ProductsErrorType.VALIDATION;
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = "ProductValidationError";
    this.issues = issues;
  }

  toLogObject(): Record<string, unknown> {
    return {
      ...super.toLogObject(),
      issues: this.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      })),
    };
  }
}

export class ProductArgumentError extends ProductsManagerError {
  readonly type = ProductsErrorType.ARGUMENT;

  constructor(message: string) {
    super(message);
    this.name = "ProductArgumentError";
  }
}

export class ProductNotFoundError extends ProductsManagerError {
  readonly type = ProductsErrorType.NOT_FOUND;

  constructor(message: string) {
    super(message);
    this.name = "ProductNotFoundError";
  }
}

/**
 * 저장소 접근 실패
 *
 * Manager 에러 분류에 속하지 않으며 호출자에게 그대로 전파된다.
 */
export class ProductRepositoryError extends Error {
  readonly code?: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message);
    this.name = "ProductRepositoryError";
    this.code = options?.code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
