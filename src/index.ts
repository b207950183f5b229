/**
 * Product Catalog 공개 API
 */

export {
  ProductSchema,
  ProductInputSchema,
  createProduct,
} from "@/core/domain/Product";
export type { Product, ProductField } from "@/core/domain/Product";

export {
  ProductsErrorType,
  PRODUCT_ERROR_MESSAGES,
  ProductsManagerError,
  ProductValidationError,
  ProductArgumentError,
  ProductNotFoundError,
  ProductRepositoryError,
} from "@/core/errors/ProductErrors";

export type { IProductsRepository } from "@/core/interfaces/IProductsRepository";
export type { IProductsManager } from "@/core/interfaces/IProductsManager";
export type {
  IManagerResult,
  IManagerError,
} from "@/core/interfaces/IManagerResult";
export { settle } from "@/core/interfaces/IManagerResult";

export { SupabaseProductsRepository } from "@/repositories/SupabaseProductsRepository";
export type { SupabaseProductsRepositoryOptions } from "@/repositories/SupabaseProductsRepository";
export { ProductsManager } from "@/services/ProductsManager";
export { createSupabaseClient } from "@/config/supabase";
export { logger } from "@/config/logger";
