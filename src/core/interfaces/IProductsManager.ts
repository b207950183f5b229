/**
 * Products Manager 인터페이스
 *
 * 검증 + 비즈니스 규칙 적용 후 Repository 호출
 * 실패 시 ProductsManagerError 계열로 reject
 */

import { Product } from "@/core/domain/Product";

export interface IProductsManager {
  /**
   * 상품 추가
   * @throws ProductValidationError "Invalid product!"
   */
  add(product: Product): Promise<Product>;

  /**
   * 상품 코드로 삭제
   * @throws ProductArgumentError 코드가 null/빈 문자열/공백인 경우
   */
  delete(productCode: string | null | undefined): Promise<void>;

  /**
   * 전체 상품 조회
   * @throws ProductNotFoundError 상품이 하나도 없는 경우
   */
  getAll(): Promise<Product[]>;

  /**
   * 원산지로 검색 (대소문자 구분 완전 일치)
   * @throws ProductNotFoundError 일치하는 상품이 없는 경우
   */
  searchByOriginCountry(originCountry: string): Promise<Product[]>;

  /**
   * 상품 코드로 단일 조회
   * @throws ProductNotFoundError 해당 코드가 없는 경우
   */
  getSpecific(productCode: string): Promise<Product>;

  /**
   * 상품 수정
   * @throws ProductValidationError "Invalid prduct!"
   * @throws ProductNotFoundError 수정할 레코드가 없는 경우
   */
  update(product: Product): Promise<Product>;
}
