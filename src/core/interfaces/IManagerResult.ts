/**
 * Manager Result
 *
 * 예외 대신 태그가 붙은 결과로 분기하고 싶은 호출자를 위한 래퍼
 *
 * 사용 패턴:
 * - 성공 시: { success: true, data }
 * - 실패 시: { success: false, error: { type, message } }
 */

import {
  ProductsErrorType,
  ProductsManagerError,
} from "@/core/errors/ProductErrors";

export interface IManagerError {
  type: ProductsErrorType;
  message: string;
}

export type IManagerResult<T> =
  | { success: true; data: T }
  | { success: false; error: IManagerError };

export function createSuccessResult<T>(data: T): IManagerResult<T> {
  return { success: true, data };
}

export function createErrorResult<T>(
  error: ProductsManagerError,
): IManagerResult<T> {
  return {
    success: false,
    error: { type: error.type, message: error.message },
  };
}

/**
 * Manager 호출을 결과 객체로 변환
 *
 * ProductsManagerError만 결과로 변환하고, 저장소 오류 등 그 외 예외는 그대로 reject
 */
export async function settle<T>(
  operation: Promise<T>,
): Promise<IManagerResult<T>> {
  try {
    return createSuccessResult(await operation);
  } catch (error) {
    if (error instanceof ProductsManagerError) {
      return createErrorResult<T>(error);
    }
    throw error;
  }
}
