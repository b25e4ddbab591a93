import { describe, it, expect, beforeEach } from 'vitest';
import { CatalogGateway, CatalogUnavailableError } from '../../../src/infrastructure/catalog/catalog-gateway.js';
import { isValidProductId } from '../../../src/infrastructure/catalog/product-repository.js';
import { fakeLogger, PRODUCT_ID } from '../../helpers.js';
import type { FakeLogger } from '../../helpers.js';

const OPTIONS = { url: 'mongodb://localhost:27017', database: 'test', collection: 'products' };

describe('isValidProductId', () => {
  it('accepts 24 hex characters', () => {
    expect(isValidProductId(PRODUCT_ID)).toBe(true);
    expect(isValidProductId('ABCDEFABCDEFABCDEFABCDEF')).toBe(true);
  });

  it.each(['', 'abc', `${PRODUCT_ID}0`, 'zzzzzzzzzzzzzzzzzzzzzzzz', '11111111-2222-3333-4444-555555555555'])(
    'rejects %j',
    (id) => {
      expect(isValidProductId(id)).toBe(false);
    },
  );
});

describe('CatalogGateway before connecting', () => {
  let log: FakeLogger;
  let gateway: CatalogGateway;

  beforeEach(() => {
    log = fakeLogger();
    gateway = new CatalogGateway(OPTIONS, log);
  });

  it('reports disconnected', () => {
    expect(gateway.isConnected()).toBe(false);
  });

  it('skips product validation', async () => {
    await expect(gateway.productExists(PRODUCT_ID)).resolves.toBe(true);
    expect(log.warn).toHaveBeenCalledWith(
      { product_id: PRODUCT_ID },
      'Catalog not connected, skipping product validation',
    );
  });

  it('refuses rating writes', async () => {
    await expect(gateway.setProductRating(PRODUCT_ID, 4, new Date())).rejects.toBeInstanceOf(CatalogUnavailableError);
  });

  it('disconnect is a no-op', async () => {
    await gateway.disconnect();
    expect(log.info).not.toHaveBeenCalled();
  });
});
