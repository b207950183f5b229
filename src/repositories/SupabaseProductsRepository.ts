/**
 * Supabase Products Repository 구현
 *
 * SOLID 원칙:
 * - SRP: Supabase와의 데이터 통신만 담당
 * - DIP: IProductsRepository 인터페이스 구현
 *
 * Design Pattern:
 * - Repository Pattern: 데이터 접근 로직 캡슐화
 * - 클라이언트는 생성자 주입 (테스트마다 독립된 저장소 사용 가능)
 */

import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import { IProductsRepository } from "@/core/interfaces/IProductsRepository";
import { Product, ProductField, ProductSchema } from "@/core/domain/Product";
import { ProductRepositoryError } from "@/core/errors/ProductErrors";
import { DATABASE_CONFIG, REPOSITORY_CONFIG } from "@/config/constants";
import { logger as defaultLogger, Logger } from "@/config/logger";

export interface SupabaseProductsRepositoryOptions {
  tableName?: string;
  pageSize?: number;
  logger?: Logger;
}

/**
 * Supabase Products Repository
 */
export class SupabaseProductsRepository implements IProductsRepository {
  private readonly tableName: string;
  private readonly pageSize: number;
  private readonly logger: Logger;
  private readonly defaultFields =
    REPOSITORY_CONFIG.DEFAULT_PRODUCT_FIELDS.join(", ");

  constructor(
    private readonly client: SupabaseClient,
    options: SupabaseProductsRepositoryOptions = {},
  ) {
    this.tableName = options.tableName ?? DATABASE_CONFIG.PRODUCTS_TABLE_NAME;
    this.pageSize = options.pageSize ?? REPOSITORY_CONFIG.PAGINATION_PAGE_SIZE;
    this.logger = options.logger ?? defaultLogger;
  }

  async insert(product: Product): Promise<Product> {
    const { data, error } = await this.client
      .from(this.tableName)
      .insert(this.toRow(product))
      .select(this.defaultFields);

    if (error) {
      throw this.queryFailed("insert", error);
    }

    const [inserted] = this.parseResults(data);
    if (!inserted) {
      throw new ProductRepositoryError("Insert returned no row");
    }

    this.logger.info(
      { id: inserted.id, product_code: inserted.product_code },
      "[Repository] 상품 삽입 완료",
    );
    return inserted;
  }

  async deleteByCode(productCode: string): Promise<void> {
    const { error } = await this.client
      .from(this.tableName)
      .delete()
      .eq("product_code", productCode);

    if (error) {
      throw this.queryFailed("deleteByCode", error);
    }

    this.logger.info(
      { product_code: productCode },
      "[Repository] 상품 삭제 완료",
    );
  }

  /**
   * 전체 상품 조회
   *
   * PostgREST max-rows 제한을 우회하기 위해 range 기반 pagination
   */
  async findAll(): Promise<Product[]> {
    const allResults: Product[] = [];
    let offset = 0;
    let hasMore = true;
    let pageCount = 0;

    while (hasMore) {
      const { data, error } = await this.client
        .from(this.tableName)
        .select(this.defaultFields)
        .order("id", { ascending: true })
        .range(offset, offset + this.pageSize - 1);

      if (error) {
        throw this.queryFailed("findAll", error, { offset });
      }

      const page = this.parseResults(data);
      allResults.push(...page);
      offset += this.pageSize;
      pageCount++;
      hasMore = page.length === this.pageSize;

      this.logger.debug(
        { page: pageCount, fetched: page.length, total: allResults.length },
        "[Repository] Pagination 진행 중",
      );
    }

    this.logger.info(
      { totalCount: allResults.length, pageCount },
      "[Repository] 전체 상품 조회 완료",
    );
    return allResults;
  }

  async findBy(
    field: ProductField,
    value: string | number,
  ): Promise<Product[]> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select(this.defaultFields)
      .eq(field, value)
      .order("id", { ascending: true });

    if (error) {
      throw this.queryFailed("findBy", error, { field });
    }

    const results = this.parseResults(data);
    this.logger.info(
      { field, value, count: results.length },
      "[Repository] 상품 검색 완료",
    );
    return results;
  }

  async findByCode(productCode: string): Promise<Product | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select(this.defaultFields)
      .eq("product_code", productCode)
      .limit(1);

    if (error) {
      throw this.queryFailed("findByCode", error);
    }

    const [product] = this.parseResults(data);
    if (!product) {
      this.logger.info(
        { product_code: productCode },
        "[Repository] 상품을 찾을 수 없음",
      );
      return null;
    }
    return product;
  }

  async update(product: Product): Promise<Product | null> {
    const { id, ...fields } = this.toRow(product);
    const query = this.client.from(this.tableName).update(fields);
    const filtered =
      id !== undefined
        ? query.eq("id", id)
        : query.eq("product_code", product.product_code);

    const { data, error } = await filtered.select(this.defaultFields);

    if (error) {
      throw this.queryFailed("update", error);
    }

    const [updated] = this.parseResults(data);
    if (!updated) {
      this.logger.warn(
        { id: product.id, product_code: product.product_code },
        "[Repository] 수정 대상 레코드 없음",
      );
      return null;
    }

    this.logger.info(
      { id: updated.id, product_code: updated.product_code },
      "[Repository] 상품 수정 완료",
    );
    return updated;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const { error } = await this.client
        .from(this.tableName)
        .select("id")
        .limit(1);

      if (error) {
        this.logger.error(
          { error: error.message, code: error.code },
          "[Repository] Health check 실패",
        );
        return false;
      }

      this.logger.debug("[Repository] Health check 성공");
      return true;
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        "[Repository] Health check 실패",
      );
      return false;
    }
  }

  /**
   * 도메인 객체를 DB 행으로 변환
   * id가 0 이하면 DB가 부여하도록 제외
   */
  private toRow(product: Product): Partial<Product> {
    const { id, ...fields } = product;
    return id > 0 ? { id, ...fields } : fields;
  }

  /**
   * DB 레코드를 도메인 객체로 변환
   */
  private parseResults(data: unknown): Product[] {
    if (!data) {
      return [];
    }
    return ProductSchema.array().parse(data);
  }

  private queryFailed(
    operation: string,
    error: PostgrestError,
    context: Record<string, unknown> = {},
  ): ProductRepositoryError {
    this.logger.error(
      { operation, error: error.message, code: error.code, ...context },
      "[Repository] Supabase 쿼리 실패",
    );
    return new ProductRepositoryError(
      `Supabase query failed: ${error.message}`,
      { code: error.code, cause: error },
    );
  }
}
