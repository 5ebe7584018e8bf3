import { CategoryRepository } from '../repositories/category.repository';
import { Category, CategoryPatch, CreateCategoryInput } from '../types/category.types';
import { AppError, ErrorCode } from '../types/error.types';
import { applyPatch } from '../utils/patch';
import { logger } from '../config/logger';

/**
 * Category Service
 */
export class CategoryService {
  constructor(private categoryRepo: CategoryRepository) {}

  async getAllCategories(): Promise<Category[]> {
    return this.categoryRepo.findAll();
  }

  async getCategoryById(id: number): Promise<Category | null> {
    return this.categoryRepo.findById(id);
  }

  async createCategory(input: CreateCategoryInput): Promise<Category> {
    const category = await this.categoryRepo.create(input);
    logger.info('Category created', { categoryId: category.id });
    return category;
  }

  async updateCategory(id: number, patch: CategoryPatch): Promise<Category | null> {
    const existing = await this.categoryRepo.findById(id);
    if (!existing) return null;

    const merged = applyPatch({ name: existing.name, description: existing.description }, patch);
    return this.categoryRepo.update(id, merged);
  }

  /**
   * Categories that still own products are kept
   */
  async deleteCategory(id: number): Promise<boolean> {
    const existing = await this.categoryRepo.findById(id);
    if (!existing) return false;

    if (existing.productCount > 0) {
      throw new AppError(
        ErrorCode.RESOURCE_IN_USE,
        `Category with ID ${id} still has ${existing.productCount} products.`,
        409,
        { categoryId: id, productCount: existing.productCount }
      );
    }

    const deleted = await this.categoryRepo.delete(id);
    if (deleted) logger.info('Category deleted', { categoryId: id });
    return deleted;
  }
}
