// Catalog coordinators. Products are never deleted, only deactivated.

import {Either, Left, Right} from 'purify-ts';
import type {Product} from '../domain';
import type {AppEffects} from './effects';
import {validatePrice, validateProductName, validateStock} from './businessLogic';
import {andThen, OrderError, productNotFound} from './errors';

function found(productId: number, product: Product | null): Either<OrderError, Product> {
  return product ? Right(product) : Left(productNotFound(productId));
}

export function getProduct(
  productId: number
): (effects: AppEffects) => Promise<Either<OrderError, Product>> {
  return async (effects: AppEffects) => found(productId, await effects.products.getById(productId));
}

export function listActiveProducts(): (effects: AppEffects) => Promise<Product[]> {
  return async (effects: AppEffects) => effects.products.listActive();
}

export function listInactiveProducts(): (effects: AppEffects) => Promise<Product[]> {
  return async (effects: AppEffects) => effects.products.listInactive();
}

/**
 * Creating a product whose name already exists returns the existing product
 * unchanged.
 */
export function createProduct(
  name: string,
  price: number,
  stock: number
): (effects: AppEffects) => Promise<Either<OrderError, Product>> {
  return async (effects: AppEffects) => {
    const fields = validateProductName(name).chain(validName =>
      validatePrice(price).chain(validPrice =>
        validateStock(stock).map(validStock => ({ name: validName, price: validPrice, stock: validStock }))));

    return andThen(fields, async valid =>
      Right(await effects.products.create(valid.name, valid.price, valid.stock)));
  };
}

export function setProductPrice(
  productId: number,
  price: number
): (effects: AppEffects) => Promise<Either<OrderError, Product>> {
  return async (effects: AppEffects) =>
    andThen(validatePrice(price), async valid =>
      found(productId, await effects.products.setPrice(productId, valid)));
}

/**
 * Absolute stock level, as counted on the shelf.
 */
export function setProductStock(
  productId: number,
  stock: number
): (effects: AppEffects) => Promise<Either<OrderError, Product>> {
  return async (effects: AppEffects) =>
    andThen(validateStock(stock), async valid =>
      found(productId, await effects.products.setStock(productId, valid)));
}

export function deactivateProduct(
  productId: number
): (effects: AppEffects) => Promise<Either<OrderError, Product>> {
  return async (effects: AppEffects) => found(productId, await effects.products.setActive(productId, false));
}

export function reactivateProduct(
  productId: number
): (effects: AppEffects) => Promise<Either<OrderError, Product>> {
  return async (effects: AppEffects) => found(productId, await effects.products.setActive(productId, true));
}

export const DEMO_PRODUCTS: readonly { name: string; price: number; stock: number }[] = [
  { name: 'Bouteille 1.0L', price: 2.5, stock: 50 },
  { name: 'Pack 6x0.5L', price: 6.9, stock: 30 },
  { name: 'Pod arôme citron', price: 3.2, stock: 100 },
];

/**
 * Fill an empty catalog with a few demo products. A catalog holding any
 * product, active or not, is left alone.
 */
export function seedDemoCatalog(): (effects: AppEffects) => Promise<Product[]> {
  return async (effects: AppEffects) => {
    const [active, inactive] = await Promise.all([
      effects.products.listActive(),
      effects.products.listInactive(),
    ]);
    if (active.length > 0 || inactive.length > 0) return [];

    const created: Product[] = [];
    for (const demo of DEMO_PRODUCTS) {
      created.push(await effects.products.create(demo.name, demo.price, demo.stock));
    }
    return created;
  };
}
