/**
 * ProductsManager 통합 테스트
 *
 * Manager → SupabaseProductsRepository → Supabase client → in-memory PostgREST
 * 테스트마다 새 저장소를 만들고 afterEach에서 폐기한다.
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import pino from "pino";
import { ProductsManager } from "@/services/ProductsManager";
import { SupabaseProductsRepository } from "@/repositories/SupabaseProductsRepository";
import { createProduct, Product } from "@/core/domain/Product";
import {
  ProductArgumentError,
  ProductNotFoundError,
  ProductRepositoryError,
  ProductsErrorType,
  ProductValidationError,
} from "@/core/errors/ProductErrors";
import { settle } from "@/core/interfaces/IManagerResult";
import {
  createTestProductsDbContext,
  InMemoryPostgrest,
  TestProductsDbContext,
} from "../support/InMemoryPostgrest";

const silentLogger = pino({ level: "silent" });

const captureError = async (operation: Promise<unknown>): Promise<unknown> => {
  try {
    await operation;
  } catch (error) {
    return error;
  }
  throw new Error("operation resolved but was expected to reject");
};

const createTestProduct = (overrides: Partial<Product> = {}): Product =>
  createProduct({
    product_code: "QX71A",
    product_name: "Linen towel",
    description: "Hand-woven bath towel",
    price: 1.25,
    quantity: 100,
    origin_country: "Portugal",
    ...overrides,
  });

describe("ProductsManager (integration)", () => {
  let context: TestProductsDbContext;
  let database: InMemoryPostgrest;
  let manager: ProductsManager;

  beforeEach(() => {
    context = createTestProductsDbContext();
    database = context.database;
    manager = new ProductsManager(
      new SupabaseProductsRepository(context.client, { logger: silentLogger }),
      silentLogger,
    );
  });

  afterEach(() => {
    context.dispose();
  });

  describe("add()", () => {
    it("유효한 상품은 모든 필드가 그대로 저장됨", async () => {
      const product = createTestProduct();

      const stored = await manager.add(product);

      expect(stored.id).toBe(1);
      expect(database.findProduct("QX71A")).toEqual({ ...product, id: 1 });
    });

    it("지정한 id는 유지됨", async () => {
      await manager.add(createTestProduct({ id: 100 }));

      expect(database.findProduct("QX71A")?.id).toBe(100);
    });

    it("음수 가격이면 ValidationError, 저장소에 요청이 가지 않음", async () => {
      const product = createTestProduct({ price: -1 });

      const error = await captureError(manager.add(product));

      expect(error).toBeInstanceOf(ProductValidationError);
      expect(error).toHaveProperty("message", "Invalid product!");
      expect(database.findProduct("QX71A")).toBeUndefined();
      expect(database.requests).toHaveLength(0);
    });

    it("공백 상품 코드면 ValidationError", async () => {
      const error = await captureError(
        manager.add(createTestProduct({ product_code: "   " })),
      );

      expect(error).toBeInstanceOf(ProductValidationError);
      expect(database.products()).toHaveLength(0);
    });

    it("중복 상품 코드는 저장소 오류로 전파", async () => {
      await manager.add(createTestProduct());

      const error = await captureError(
        manager.add(createTestProduct({ product_name: "Another towel" })),
      );

      expect(error).toBeInstanceOf(ProductRepositoryError);
      expect(error).toHaveProperty("code", "23505");
      expect(database.products()).toHaveLength(1);
    });
  });

  describe("delete()", () => {
    it("존재하는 코드로 삭제하면 해당 레코드만 제거", async () => {
      await manager.add(createTestProduct({ id: 100, product_code: "DEL01" }));
      await manager.add(createTestProduct({ id: 101, product_code: "KEEP01" }));

      await manager.delete("DEL01");

      expect(database.findProduct("DEL01")).toBeUndefined();
      expect(database.products().map((p) => p.product_code)).toEqual([
        "KEEP01",
      ]);
    });

    it.each([null, undefined, "", "   "])(
      "코드가 %p 이면 ArgumentError",
      async (code) => {
        const error = await captureError(manager.delete(code));

        expect(error).toBeInstanceOf(ProductArgumentError);
        expect(error).toHaveProperty("message", "Product code cannot be empty.");
      },
    );

    it("없는 코드 삭제는 no-op", async () => {
      await manager.add(createTestProduct());

      await expect(manager.delete("NOPE1")).resolves.toBeUndefined();
      expect(database.products()).toHaveLength(1);
    });
  });

  describe("getAll()", () => {
    it("저장된 상품 전체를 필드 그대로 반환", async () => {
      const first = createTestProduct({
        id: 100,
        product_code: "CER01",
        product_name: "Clay pot",
        price: 25.5,
        quantity: 5,
        origin_country: "Peru",
      });
      const second = createTestProduct({
        id: 256,
        product_code: "TEA02",
        product_name: "Green tea",
        price: 12.9,
        quantity: 26,
        origin_country: "Japan",
      });
      await manager.add(first);
      await manager.add(second);

      const result = await manager.getAll();

      expect(result).toHaveLength(2);
      expect(result.find((p) => p.id === 100)).toEqual(first);
      expect(result.find((p) => p.id === 256)).toEqual(second);
    });

    it("상품이 없으면 NotFoundError", async () => {
      const error = await captureError(manager.getAll());

      expect(error).toBeInstanceOf(ProductNotFoundError);
      expect(error).toHaveProperty("message", "No product found.");
      expect(database.products()).toHaveLength(0);
    });
  });

  describe("searchByOriginCountry()", () => {
    beforeEach(async () => {
      await manager.add(
        createTestProduct({ product_code: "PE001", origin_country: "Peru" }),
      );
      await manager.add(
        createTestProduct({ product_code: "CL001", origin_country: "Chile" }),
      );
      await manager.add(
        createTestProduct({ product_code: "PE002", origin_country: "Peru" }),
      );
    });

    it("원산지가 일치하는 상품만 빠짐없이 반환", async () => {
      const result = await manager.searchByOriginCountry("Peru");
      const expected = database
        .products()
        .filter((p) => p.origin_country === "Peru");

      expect(result).toEqual(expected);
      expect(result.map((p) => p.product_code)).toEqual(["PE001", "PE002"]);
      expect(result.every((p) => p.origin_country === "Peru")).toBe(true);
    });

    it("대소문자가 다르면 일치하지 않음", async () => {
      const error = await captureError(manager.searchByOriginCountry("peru"));

      expect(error).toBeInstanceOf(ProductNotFoundError);
    });

    it("일치하는 상품이 없으면 NotFoundError", async () => {
      const error = await captureError(
        manager.searchByOriginCountry("Iceland"),
      );

      expect(error).toBeInstanceOf(ProductNotFoundError);
      expect(error).toHaveProperty(
        "message",
        "No product found with the given first name.",
      );
    });
  });

  describe("getSpecific()", () => {
    it("상품 코드로 조회", async () => {
      const product = createTestProduct({ id: 100, product_code: "CER01" });
      await manager.add(product);

      const result = await manager.getSpecific("CER01");

      expect(result).toEqual(product);
    });

    it("없는 코드면 코드가 포함된 NotFoundError", async () => {
      const error = await captureError(manager.getSpecific("missing01"));

      expect(error).toBeInstanceOf(ProductNotFoundError);
      expect(error).toHaveProperty(
        "message",
        "No product found with product code: missing01",
      );
    });
  });

  describe("update()", () => {
    it("변경된 값이 저장되고 이전 값은 남지 않음", async () => {
      const product = createTestProduct({ id: 100, product_name: "Clay pot" });
      await manager.add(product);

      const updated = await manager.update({
        ...product,
        product_name: "Glazed clay pot",
      });

      const [stored] = database.products();
      expect(updated.product_name).toBe("Glazed clay pot");
      expect(stored.product_name).toBe("Glazed clay pot");
      expect(stored.product_name).not.toBe("Clay pot");
    });

    it("id가 있으면 id 기준으로 찾아 상품 코드도 변경 가능", async () => {
      await manager.add(createTestProduct({ id: 7, product_code: "OLD01" }));

      await manager.update(createTestProduct({ id: 7, product_code: "NEW01" }));

      expect(database.products().map((p) => p.product_code)).toEqual([
        "NEW01",
      ]);
    });

    it("id가 0이면 상품 코드 기준으로 수정", async () => {
      await manager.add(createTestProduct({ quantity: 100 }));

      await manager.update(createTestProduct({ quantity: 3 }));

      expect(database.findProduct("QX71A")?.quantity).toBe(3);
    });

    it("기본값 상품이면 ValidationError (메시지 고정)", async () => {
      const error = await captureError(manager.update(createProduct()));

      expect(error).toBeInstanceOf(ProductValidationError);
      expect(error).toHaveProperty("message", "Invalid prduct!");
      expect(database.requests).toHaveLength(0);
    });

    it("일치하는 레코드가 없으면 NotFoundError", async () => {
      const error = await captureError(
        manager.update(createTestProduct({ product_code: "GHOST" })),
      );

      expect(error).toBeInstanceOf(ProductNotFoundError);
      expect(error).toHaveProperty(
        "message",
        "No product found with product code: GHOST",
      );
    });
  });

  describe("settle()", () => {
    it("성공 시 data 반환", async () => {
      const result = await settle(manager.add(createTestProduct()));

      expect(result).toEqual({
        success: true,
        data: { ...createTestProduct(), id: 1 },
      });
    });

    it("Manager 에러는 태그된 결과로 변환", async () => {
      const result = await settle(manager.getAll());

      expect(result).toEqual({
        success: false,
        error: {
          type: ProductsErrorType.NOT_FOUND,
          message: "No product found.",
        },
      });
    });

    it("저장소 오류는 그대로 reject", async () => {
      database.failNextRequest("XX000", "connection lost");

      await expect(settle(manager.getAll())).rejects.toBeInstanceOf(
        ProductRepositoryError,
      );
    });
  });
});
