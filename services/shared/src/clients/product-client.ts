import { z } from 'zod';
import { ProductDetails } from '../types/inventory.types';
import { readInt } from '../config';
import { ConfigurationError, ProductServiceError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ProductMetadataClient {
     /** Resolves to null when the product service does not know the id. */
     getProductById(productId: string): Promise<ProductDetails | null>;
}

const optionalText = z.string().optional().catch(undefined);

const productDocumentSchema = z.object({
     id: z.union([z.string().min(1), z.number().finite().transform(String)]),
     name: z.string().min(1),
     sku: optionalText,
     price: z
          .union([z.number(), z.string().trim().min(1)])
          .pipe(z.coerce.number().finite())
          .optional()
          .catch(undefined),
     category: optionalText,
});

/** A bare product document, or one wrapped in `{ data: ... }`. */
const productResponseSchema = z.union([
     z.object({ data: productDocumentSchema }).transform((body) => body.data),
     productDocumentSchema,
]);

export function parseProductDetails(body: unknown): ProductDetails | null {
     const result = productResponseSchema.safeParse(body);
     if (!result.success) {
          logger.debug({ issues: result.error.issues }, 'Product document rejected');
          return null;
     }
     return result.data;
}

export class ProductHttpClient implements ProductMetadataClient {
     constructor(
          private baseUrl: string,
          private apiKey: string,
          private timeoutMs: number = 2000
     ) {}

     async getProductById(productId: string): Promise<ProductDetails | null> {
          logger.debug({ productId }, 'Product service lookup');

          const response = await fetch(
               `${this.baseUrl}/api/v1/products/${encodeURIComponent(productId)}`,
               {
                    headers: {
                         Authorization: `Bearer ${this.apiKey}`,
                         Accept: 'application/json',
                    },
                    signal: AbortSignal.timeout(this.timeoutMs),
               }
          );

          if (response.status === 404) {
               logger.warn({ productId }, 'Product not found in product service');
               return null;
          }

          if (!response.ok) {
               throw new ProductServiceError(response.status, await response.text());
          }

          const details = parseProductDetails(await response.json());
          if (!details) {
               logger.warn({ productId }, 'Product service returned an unrecognised document');
          }
          return details;
     }
}

export class ProductMockClient implements ProductMetadataClient {
     private products = new Map<string, ProductDetails>();

     constructor(products: ProductDetails[] = []) {
          for (const product of products) {
               this.products.set(product.id, product);
          }
     }

     register(product: ProductDetails): void {
          this.products.set(product.id, product);
     }

     async getProductById(productId: string): Promise<ProductDetails | null> {
          logger.debug({ productId }, 'Mock product lookup');
          return this.products.get(productId) ?? null;
     }
}

export function createProductClient(env: Record<string, string | undefined> = process.env): ProductMetadataClient {
     const clientType = env.PRODUCT_CLIENT_TYPE || 'mock';

     if (clientType === 'mock') {
          logger.info('Using mock product client');
          return new ProductMockClient();
     }

     const baseUrl = env.PRODUCT_API_URL;
     const apiKey = env.PRODUCT_API_KEY;

     if (!baseUrl || !apiKey) {
          throw new ConfigurationError('PRODUCT_API_URL and PRODUCT_API_KEY must be set for HTTP client');
     }

     const timeoutMs = readInt(env, 'PRODUCT_API_TIMEOUT_MS', 2000);

     logger.info({ baseUrl }, 'Using HTTP product client');
     return new ProductHttpClient(baseUrl, apiKey, timeoutMs);
}
