import { Request, Response } from 'express';
import { CategoryService } from '../services/category.service';
import { CreateCategoryBody, UpdateCategoryBody } from '../validators/category.validator';
import { ErrorCode } from '../types/error.types';
import { notFoundResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { toInt } from '../utils/request';

/**
 * Category Controller
 */
export class CategoryController {
  constructor(private categoryService: CategoryService) {}

  getCategories = asyncHandler(async (_req: Request, res: Response) => {
    res.status(200).json(await this.categoryService.getAllCategories());
  });

  getCategory = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);

    const category = await this.categoryService.getCategoryById(id);

    if (!category) {
      res.status(404).json(notFoundResponse(ErrorCode.CATEGORY_NOT_FOUND, 'Category', id));
      return;
    }

    res.status(200).json(category);
  });

  createCategory = asyncHandler(async (req: Request, res: Response) => {
    const body: CreateCategoryBody = req.body;

    const category = await this.categoryService.createCategory(body);

    res.location(`/api/categories/${category.id}`).status(201).json(category);
  });

  updateCategory = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);
    const body: UpdateCategoryBody = req.body;

    const category = await this.categoryService.updateCategory(id, body);

    if (!category) {
      res.status(404).json(notFoundResponse(ErrorCode.CATEGORY_NOT_FOUND, 'Category', id));
      return;
    }

    res.status(200).json(category);
  });

  deleteCategory = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);

    if (!(await this.categoryService.deleteCategory(id))) {
      res.status(404).json(notFoundResponse(ErrorCode.CATEGORY_NOT_FOUND, 'Category', id));
      return;
    }

    res.status(204).send();
  });
}
