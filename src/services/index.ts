import { Repositories } from '../repositories';
import { AuthService } from './auth.service';
import { CategoryService } from './category.service';
import { OrderService } from './order.service';
import { ProductService } from './product.service';
import { UserService } from './user.service';

export interface Services {
  categoryService: CategoryService;
  productService: ProductService;
  orderService: OrderService;
  userService: UserService;
  authService: AuthService;
}

export function createServices(repos: Repositories): Services {
  return {
    categoryService: new CategoryService(repos.categories),
    productService: new ProductService(repos.products, repos.categories),
    orderService: new OrderService(repos.orders, repos.users, repos.products),
    userService: new UserService(repos.users),
    authService: new AuthService(repos.users, repos.sessions),
  };
}

export { AuthService, CategoryService, OrderService, ProductService, UserService };
