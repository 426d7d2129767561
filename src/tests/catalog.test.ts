import {addToCart, clearCart, listCart} from '../pure/cart';
import {
  createProduct,
  deactivateProduct,
  getProduct,
  listActiveProducts,
  listInactiveProducts,
  reactivateProduct,
  seedDemoCatalog,
  setProductPrice,
  setProductStock,
} from '../pure/catalog';
import {createTestEffects, TestEffects} from './testEffects';

async function stockShelf(effects: TestEffects): Promise<void> {
  await createProduct('Savon', 2.5, 5)(effects);
  await createProduct('Huile', 6.9, 3)(effects);
}

describe('catalog', () => {
  it('creates a product with a trimmed name', async () => {
    const effects = createTestEffects();

    const result = await createProduct(' Savon ', 2.5, 5)(effects);

    expect(result.extract()).toEqual({ id: 1, name: 'Savon', price: 2.5, stock: 5, active: true });
  });

  it('returns the existing product when the name is taken', async () => {
    const effects = createTestEffects();
    await createProduct('Savon', 2.5, 5)(effects);

    const again = await createProduct('Savon', 9, 9)(effects);

    expect(again.extract()).toEqual({ id: 1, name: 'Savon', price: 2.5, stock: 5, active: true });
    expect(await listActiveProducts()(effects)).toHaveLength(1);
  });

  it('rejects malformed products', async () => {
    const effects = createTestEffects();

    expect((await createProduct('', 1, 1)(effects)).extract()).toMatchObject({ code: 'INVALID_INPUT', field: 'name' });
    expect((await createProduct('Sel', -1, 1)(effects)).extract()).toMatchObject({ code: 'INVALID_INPUT', field: 'price' });
    expect((await createProduct('Sel', 1, 1.5)(effects)).extract()).toMatchObject({ code: 'INVALID_INPUT', field: 'stock' });
    expect(await listActiveProducts()(effects)).toEqual([]);
  });

  it('updates price and absolute stock', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);

    await setProductPrice(1, 3)(effects);
    await setProductStock(1, 12)(effects);

    expect((await getProduct(1)(effects)).extract()).toEqual({ id: 1, name: 'Savon', price: 3, stock: 12, active: true });
  });

  it('reports unknown products', async () => {
    const effects = createTestEffects();

    expect((await getProduct(99)(effects)).extract()).toEqual({ code: 'PRODUCT_NOT_FOUND', productId: 99 });
    expect((await setProductPrice(99, 3)(effects)).extract()).toEqual({ code: 'PRODUCT_NOT_FOUND', productId: 99 });
  });

  it('refuses a negative stock level', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);

    const result = await setProductStock(1, -1)(effects);

    expect(result.isLeft()).toBe(true);
    expect((await getProduct(1)(effects)).unsafeCoerce().stock).toBe(5);
  });

  it('deactivates and reactivates without deleting', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);

    await deactivateProduct(2)(effects);
    expect((await listActiveProducts()(effects)).map(p => p.name)).toEqual(['Savon']);
    expect((await listInactiveProducts()(effects)).map(p => p.name)).toEqual(['Huile']);

    await reactivateProduct(2)(effects);
    expect((await listActiveProducts()(effects)).map(p => p.name)).toEqual(['Savon', 'Huile']);
    expect(await listInactiveProducts()(effects)).toEqual([]);
  });
});

describe('cart', () => {
  it('accumulates repeated additions of a product', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);

    await addToCart('cust-1', 1, 2)(effects);
    const view = (await addToCart('cust-1', 1, 3)(effects)).unsafeCoerce();

    expect(view.lines).toHaveLength(1);
    expect(view.lines[0].quantity).toBe(5);
    expect(view.subtotal).toBe(12.5);
  });

  it('prices the cart at current catalog prices', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);
    await addToCart('cust-1', 1, 2)(effects);
    await addToCart('cust-1', 2, 1)(effects);

    expect((await listCart('cust-1')(effects)).subtotal).toBe(11.9);

    await setProductPrice(2, 7.5)(effects);
    expect((await listCart('cust-1')(effects)).subtotal).toBe(12.5);
  });

  it('keeps carts apart per customer', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);
    await addToCart('cust-1', 1, 2)(effects);

    expect((await listCart('cust-2')(effects)).lines).toEqual([]);
  });

  it('refuses inactive or unknown products and bad quantities', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);
    await deactivateProduct(2)(effects);

    expect((await addToCart('cust-1', 2, 1)(effects)).extract()).toEqual({ code: 'PRODUCT_NOT_FOUND', productId: 2 });
    expect((await addToCart('cust-1', 42, 1)(effects)).extract()).toEqual({ code: 'PRODUCT_NOT_FOUND', productId: 42 });
    expect((await addToCart('cust-1', 1, 0)(effects)).extract()).toMatchObject({ field: 'quantity' });
    expect((await listCart('cust-1')(effects)).lines).toEqual([]);
  });

  it('leaves out products deactivated after they were added', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);
    await addToCart('cust-1', 1, 2)(effects);
    await addToCart('cust-1', 2, 1)(effects);

    await deactivateProduct(2)(effects);

    const view = await listCart('cust-1')(effects);
    expect(view.lines.map(line => line.product.name)).toEqual(['Savon']);
    expect(view.subtotal).toBe(5);
  });

  it('clears the cart', async () => {
    const effects = createTestEffects();
    await stockShelf(effects);
    await addToCart('cust-1', 1, 2)(effects);

    await clearCart('cust-1')(effects);

    expect((await listCart('cust-1')(effects)).lines).toEqual([]);
  });
});

describe('seedDemoCatalog', () => {
  it('fills an empty catalog with the demo products', async () => {
    const effects = createTestEffects();

    const seeded = await seedDemoCatalog()(effects);

    expect(seeded).toEqual([
      { id: 1, name: 'Bouteille 1.0L', price: 2.5, stock: 50, active: true },
      { id: 2, name: 'Pack 6x0.5L', price: 6.9, stock: 30, active: true },
      { id: 3, name: 'Pod arôme citron', price: 3.2, stock: 100, active: true },
    ]);
  });

  it('leaves a catalog alone once it has any product, even an inactive one', async () => {
    const effects = createTestEffects();
    await createProduct('Savon', 2.5, 5)(effects);
    await deactivateProduct(1)(effects);

    expect(await seedDemoCatalog()(effects)).toEqual([]);
    expect(await listActiveProducts()(effects)).toEqual([]);
  });
});
