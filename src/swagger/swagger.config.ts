import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates the OpenAPI 3.0 document from the @swagger blocks in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Store API',
      version: '1.0.0',
      description: `
REST API for an online store: categories, products, orders, users and authentication.

## Orders
Creating an order decrements stock for every line and inserts the order in a
single database transaction. Either the whole order is stored or nothing is,
and concurrent orders for the same product cannot oversell it.

## Order status
Pending, Processing, Shipped, Delivered, Cancelled. Entering Shipped or
Delivered for the first time stamps shippedDate / deliveredDate.
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Categories', description: 'Product categories' },
      { name: 'Products', description: 'Catalog, search and pagination' },
      { name: 'Orders', description: 'Order workflow and status lifecycle' },
      { name: 'Users', description: 'Account administration' },
      { name: 'Auth', description: 'Registration and bearer sessions' },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
        },
      },
      schemas: {
        OrderItem: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            productId: { type: 'integer' },
            productName: { type: 'string', description: 'Current product name' },
            quantity: { type: 'integer', minimum: 1 },
            unitPrice: { type: 'number', description: 'Price captured at order time' },
            subtotal: { type: 'number' },
          },
        },
        Order: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            userId: { type: 'integer' },
            userName: { type: 'string' },
            totalAmount: { type: 'number' },
            status: {
              type: 'string',
              enum: ['Pending', 'Processing', 'Shipped', 'Delivered', 'Cancelled'],
            },
            shippingAddress: { type: 'string' },
            orderDate: { type: 'string', format: 'date-time' },
            shippedDate: { type: 'string', format: 'date-time', nullable: true },
            deliveredDate: { type: 'string', format: 'date-time', nullable: true },
            orderItems: { type: 'array', items: { $ref: '#/components/schemas/OrderItem' } },
          },
        },
        Error: {
          type: 'object',
          properties: {
            message: { type: 'string', description: 'Human-readable error message' },
            code: { type: 'string', description: 'Error code' },
            details: { type: 'object', description: 'Additional error details' },
          },
        },
      },
    },
  },
  apis: [path.join(__dirname, '../routes/**/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
