import { Request, Response } from 'express';
import { ProductService } from '../services/product.service';
import { CreateProductBody, UpdateProductBody } from '../validators/product.validator';
import { PaginationParams } from '../types/api.types';
import { ErrorCode } from '../types/error.types';
import { notFoundResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { DEFAULT_PAGE_SIZE } from '../utils/pagination';
import { toInt, toText } from '../utils/request';

const paginationFrom = (req: Request): PaginationParams => ({
  pageNumber: toInt(req.query['pageNumber'], 1),
  pageSize: toInt(req.query['pageSize'], DEFAULT_PAGE_SIZE),
});

/**
 * Product Controller
 *
 * HTTP request handlers for product endpoints
 */
export class ProductController {
  constructor(private productService: ProductService) {}

  /**
   * GET /api/products
   */
  getProducts = asyncHandler(async (_req: Request, res: Response) => {
    res.status(200).json(await this.productService.getAllProducts());
  });

  /**
   * GET /api/products/paged
   */
  getProductsPage = asyncHandler(async (req: Request, res: Response) => {
    res.status(200).json(await this.productService.getProductsPage(paginationFrom(req)));
  });

  /**
   * GET /api/products/:id
   */
  getProduct = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);

    const product = await this.productService.getProductById(id);

    if (!product) {
      res.status(404).json(notFoundResponse(ErrorCode.PRODUCT_NOT_FOUND, 'Product', id));
      return;
    }

    res.status(200).json(product);
  });

  /**
   * GET /api/products/category/:categoryId
   */
  getProductsByCategory = asyncHandler(async (req: Request, res: Response) => {
    const categoryId = toInt(req.params['categoryId'], 0);

    res.status(200).json(await this.productService.getProductsByCategory(categoryId));
  });

  /**
   * GET /api/products/search?name=
   */
  searchProducts = asyncHandler(async (req: Request, res: Response) => {
    res.status(200).json(await this.productService.searchProductsByName(toText(req.query['name'])));
  });

  /**
   * GET /api/products/search/paged?name=&pageNumber=&pageSize=
   */
  searchProductsPage = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.productService.searchProductsByNamePage(
      toText(req.query['name']),
      paginationFrom(req)
    );

    res.status(200).json(result);
  });

  /**
   * POST /api/products
   */
  createProduct = asyncHandler(async (req: Request, res: Response) => {
    const body: CreateProductBody = req.body;

    const product = await this.productService.createProduct(body);

    res.location(`/api/products/${product.id}`).status(201).json(product);
  });

  /**
   * PUT /api/products/:id
   */
  updateProduct = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);
    const body: UpdateProductBody = req.body;

    const product = await this.productService.updateProduct(id, body);

    if (!product) {
      res.status(404).json(notFoundResponse(ErrorCode.PRODUCT_NOT_FOUND, 'Product', id));
      return;
    }

    res.status(200).json(product);
  });

  /**
   * DELETE /api/products/:id
   */
  deleteProduct = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);

    if (!(await this.productService.deleteProduct(id))) {
      res.status(404).json(notFoundResponse(ErrorCode.PRODUCT_NOT_FOUND, 'Product', id));
      return;
    }

    res.status(204).send();
  });
}
