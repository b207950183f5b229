/**
 * Products Repository 인터페이스
 *
 * SOLID 원칙:
 * - ISP: products 테이블 CRUD만 담당
 * - DIP: 추상화에 의존 (Supabase 구체 구현에 의존하지 않음)
 *
 * Note: 검증은 하지 않는다. 검증은 Manager 책임.
 */

import { Product, ProductField } from "@/core/domain/Product";

export interface IProductsRepository {
  /**
   * 상품 삽입
   * @returns 저장된 상품 (DB가 부여한 id 포함)
   */
  insert(product: Product): Promise<Product>;

  /**
   * 상품 코드로 삭제 (없으면 no-op)
   */
  deleteByCode(productCode: string): Promise<void>;

  /**
   * 전체 상품 조회 (id 오름차순)
   */
  findAll(): Promise<Product[]>;

  /**
   * 컬럼 값이 일치하는 상품 조회
   */
  findBy(field: ProductField, value: string | number): Promise<Product[]>;

  /**
   * 상품 코드로 단일 상품 조회
   * @returns 상품 또는 null
   */
  findByCode(productCode: string): Promise<Product | null>;

  /**
   * 상품 수정 (id > 0 이면 id 기준, 아니면 product_code 기준)
   * @returns 수정된 상품 또는 null (일치하는 레코드 없음)
   */
  update(product: Product): Promise<Product | null>;

  /**
   * 연결 상태 확인
   */
  healthCheck(): Promise<boolean>;
}
