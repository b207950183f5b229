/**
 * Products Manager
 *
 * SOLID 원칙:
 * - SRP: 검증 + 비즈니스 규칙만 담당, 저장은 Repository에 위임
 * - DIP: IProductsRepository 추상화에 의존
 *
 * 흐름: 호출자 → Manager (검증) → Repository → Storage
 */

import { IProductsManager } from "@/core/interfaces/IProductsManager";
import { IProductsRepository } from "@/core/interfaces/IProductsRepository";
import { Product, ProductInputSchema } from "@/core/domain/Product";
import {
  PRODUCT_ERROR_MESSAGES,
  ProductArgumentError,
  ProductNotFoundError,
  ProductsManagerError,
  ProductValidationError,
} from "@/core/errors/ProductErrors";
import { logger as defaultLogger, Logger } from "@/config/logger";

export class ProductsManager implements IProductsManager {
  constructor(
    private readonly repository: IProductsRepository,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async add(product: Product): Promise<Product> {
    this.validate(product, PRODUCT_ERROR_MESSAGES.INVALID_PRODUCT_ON_ADD);

    const stored = await this.repository.insert(product);
    this.logger.info(
      { id: stored.id, product_code: stored.product_code },
      "[Manager] 상품 추가 완료",
    );
    return stored;
  }

  async delete(productCode: string | null | undefined): Promise<void> {
    if (!productCode || productCode.trim() === "") {
      throw this.reject(
        new ProductArgumentError(PRODUCT_ERROR_MESSAGES.EMPTY_PRODUCT_CODE),
      );
    }

    await this.repository.deleteByCode(productCode);
  }

  async getAll(): Promise<Product[]> {
    const products = await this.repository.findAll();

    if (products.length === 0) {
      throw this.reject(
        new ProductNotFoundError(PRODUCT_ERROR_MESSAGES.NO_PRODUCTS),
      );
    }
    return products;
  }

  async searchByOriginCountry(originCountry: string): Promise<Product[]> {
    const products = await this.repository.findBy(
      "origin_country",
      originCountry,
    );

    if (products.length === 0) {
      throw this.reject(
        new ProductNotFoundError(
          PRODUCT_ERROR_MESSAGES.NO_PRODUCTS_FOR_COUNTRY,
        ),
      );
    }
    return products;
  }

  async getSpecific(productCode: string): Promise<Product> {
    const product = await this.repository.findByCode(productCode);

    if (!product) {
      throw this.reject(
        new ProductNotFoundError(
          PRODUCT_ERROR_MESSAGES.noProductWithCode(productCode),
        ),
      );
    }
    return product;
  }

  async update(product: Product): Promise<Product> {
    this.validate(product, PRODUCT_ERROR_MESSAGES.INVALID_PRODUCT_ON_UPDATE);

    const updated = await this.repository.update(product);

    if (!updated) {
      throw this.reject(
        new ProductNotFoundError(
          PRODUCT_ERROR_MESSAGES.noProductWithCode(product.product_code),
        ),
      );
    }

    this.logger.info(
      { id: updated.id, product_code: updated.product_code },
      "[Manager] 상품 수정 완료",
    );
    return updated;
  }

  /**
   * 저장 전 검증 - 실패한 상품은 Repository에 도달하지 않는다
   */
  private validate(product: Product, message: string): void {
    const result = ProductInputSchema.safeParse(product);

    if (!result.success) {
      throw this.reject(
        new ProductValidationError(message, result.error.issues),
      );
    }
  }

  private reject(error: ProductsManagerError): ProductsManagerError {
    this.logger.warn(error.toLogObject(), "[Manager] 요청 거부");
    return error;
  }
}
