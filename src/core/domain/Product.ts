/**
 * Product 도메인 모델
 *
 * SOLID 원칙:
 * - SRP: products 테이블 데이터와 검증 규칙만 표현
 *
 * 두 가지 스키마:
 * - ProductSchema: DB에서 읽어온 레코드 파싱 (numeric 컬럼 coerce)
 * - ProductInputSchema: Manager가 저장 전에 적용하는 비즈니스 검증
 */

import { z } from "zod";
import { PRODUCT_RULES } from "@/config/constants";

/**
 * 공백만 있는 문자열을 거부하는 필수 문자열
 */
const requiredText = (maxLength: number) =>
  z
    .string()
    .max(maxLength)
    .refine((value) => value.trim().length > 0, {
      message: "must not be blank",
    });

/**
 * products 레코드 Zod 스키마
 *
 * Note: Postgres numeric 컬럼은 문자열로 올 수 있으므로 coerce
 */
export const ProductSchema = z.object({
  id: z.coerce.number().int(),
  product_code: z.string(),
  product_name: z.string(),
  description: z.string().nullable().transform((value) => value ?? ""),
  price: z.coerce.number(),
  quantity: z.coerce.number().int(),
  origin_country: z.string(),
});

/**
 * Product 타입 (스키마로부터 추론)
 */
export type Product = z.infer<typeof ProductSchema>;

/**
 * 저장 전 검증 스키마
 */
export const ProductInputSchema = z.object({
  id: z.number().int().min(0),
  product_code: requiredText(PRODUCT_RULES.PRODUCT_CODE_MAX_LENGTH),
  product_name: requiredText(PRODUCT_RULES.PRODUCT_NAME_MAX_LENGTH),
  description: z.string().max(PRODUCT_RULES.DESCRIPTION_MAX_LENGTH),
  price: z.number().finite().min(0),
  quantity: z.number().int().min(0),
  origin_country: requiredText(PRODUCT_RULES.ORIGIN_COUNTRY_MAX_LENGTH),
});

/**
 * 기본값 상품 생성
 *
 * 저장 전 상품(id 0)과 빈 필드를 기본으로 하며, 기본값 그대로는 검증을 통과하지 않는다.
 */
export function createProduct(overrides: Partial<Product> = {}): Product {
  return {
    id: 0,
    product_code: "",
    product_name: "",
    description: "",
    price: 0,
    quantity: 0,
    origin_country: "",
    ...overrides,
  };
}

/**
 * findBy 조회에 사용할 수 있는 컬럼
 */
export type ProductField = keyof Product;
