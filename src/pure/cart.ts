import {Either, Left, Right} from 'purify-ts';
import type {AppEffects} from './effects';
import type {PricedLine} from './types';
import {calculateSubtotal, validateQuantity} from './businessLogic';
import {andThen, OrderError, productNotFound} from './errors';
import {loadPricedCart} from './orderProcessing';

export type CartView = {
  readonly lines: PricedLine[];
  readonly subtotal: number;
};

/**
 * Adding a product already in the cart adds to its quantity.
 */
export function addToCart(
  customerId: string,
  productId: number,
  quantity: number
): (effects: AppEffects) => Promise<Either<OrderError, CartView>> {
  return async (effects: AppEffects) =>
    andThen(validateQuantity(quantity), async valid => {
      const product = await effects.products.getById(productId);
      if (!product || !product.active) {
        return Left(productNotFound(productId));
      }

      await effects.carts.add(customerId, productId, valid);
      return Right(await listCart(customerId)(effects));
    });
}

/**
 * Current prices, inactive products left out.
 */
export function listCart(customerId: string): (effects: AppEffects) => Promise<CartView> {
  return async (effects: AppEffects) => {
    const lines = await loadPricedCart(customerId)(effects);
    return { lines, subtotal: calculateSubtotal(lines) };
  };
}

export function clearCart(customerId: string): (effects: AppEffects) => Promise<void> {
  return async (effects: AppEffects) => effects.carts.clear(customerId);
}
