import { ProductRepository } from '../repositories/product.repository';
import { CategoryRepository } from '../repositories/category.repository';
import { CreateProductInput, Product, ProductPatch } from '../types/product.types';
import { PagedResult, PaginationParams } from '../types/api.types';
import { ErrorCode, validationError } from '../types/error.types';
import { presentFields } from '../utils/patch';
import { emptyPage, toPagedResult } from '../utils/pagination';
import { logger } from '../config/logger';

/**
 * Product Service
 *
 * Business logic for the product catalog
 */
export class ProductService {
  constructor(
    private productRepo: ProductRepository,
    private categoryRepo: CategoryRepository
  ) {}

  async getAllProducts(): Promise<Product[]> {
    return this.productRepo.findAll();
  }

  async getProductsPage(params: PaginationParams): Promise<PagedResult<Product>> {
    const { items, totalCount } = await this.productRepo.findPage(params);
    return toPagedResult(items, totalCount, params);
  }

  async getProductById(id: number): Promise<Product | null> {
    logger.debug('Getting product', { id });
    return this.productRepo.findById(id);
  }

  async getProductsByCategory(categoryId: number): Promise<Product[]> {
    return this.productRepo.findByCategory(categoryId);
  }

  /**
   * Case-insensitive substring search. A blank term matches nothing.
   */
  async searchProductsByName(term: string): Promise<Product[]> {
    const trimmed = term.trim();
    if (!trimmed) return [];

    return this.productRepo.searchByName(trimmed);
  }

  async searchProductsByNamePage(term: string, params: PaginationParams): Promise<PagedResult<Product>> {
    const trimmed = term.trim();
    if (!trimmed) return emptyPage(params);

    const { items, totalCount } = await this.productRepo.searchByNamePage(trimmed, params);
    return toPagedResult(items, totalCount, params);
  }

  async createProduct(input: CreateProductInput): Promise<Product> {
    logger.info('Creating product', { name: input.name, categoryId: input.categoryId });

    await this.assertCategoryExists(input.categoryId);

    const product = await this.productRepo.create(input);

    logger.info('Product created successfully', { productId: product.id });
    return product;
  }

  /**
   * Partial update: only fields present in the patch are written. Stock is
   * never copied from the read below, since orders may decrement it meanwhile.
   */
  async updateProduct(id: number, patch: ProductPatch): Promise<Product | null> {
    const existing = await this.productRepo.findById(id);
    if (!existing) return null;

    if (patch.categoryId !== undefined && patch.categoryId !== null) {
      await this.assertCategoryExists(patch.categoryId);
    }

    const updated = await this.productRepo.update(id, presentFields(patch));
    if (updated) logger.info('Product updated', { productId: id });
    return updated;
  }

  async deleteProduct(id: number): Promise<boolean> {
    const deleted = await this.productRepo.delete(id);
    if (deleted) logger.info('Product deleted', { productId: id });
    return deleted;
  }

  private async assertCategoryExists(categoryId: number): Promise<void> {
    if (!(await this.categoryRepo.exists(categoryId))) {
      throw validationError(
        ErrorCode.INVALID_REFERENCE,
        `Category with ID ${categoryId} does not exist.`,
        { categoryId }
      );
    }
  }
}
