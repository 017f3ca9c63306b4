import request from 'supertest';
import { NATIVE_CURRENCY } from '../src/engine/constants.js';
import { ADMIN_KEY, ENGINE, RECIPIENT, TOKEN_T } from './support/engine-fixture.js';
import { createTestApp, TestApp } from './support/test-app.js';
import { SIGNER_A, SIGNER_B } from './support/test-buyer.js';

describe('FundingController (e2e)', () => {
  let ctx: TestApp;

  const admin = (url: string) =>
    request(ctx.app.getHttpServer()).post(url).set('x-admin-key', ADMIN_KEY);

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('should fund a native sale end to end over HTTP', async () => {
    await admin('/api/funding/item-mints')
      .send({ to: ENGINE, itemId: 7, amount: 10 })
      .expect(201, { holder: ENGINE, balance: '10' });
    await admin('/api/admin/sales')
      .send({
        itemId: 7,
        price: '2',
        startTime: 100,
        endTime: 200,
        maxSupply: 10,
        maxPerAddress: 3,
        paymentToken: NATIVE_CURRENCY,
      })
      .expect(201);
    await admin('/api/funding/native-deposits')
      .send({ to: SIGNER_A.address, amount: '9' })
      .expect(201, { holder: SIGNER_A.address, balance: '9' });

    await request(ctx.app.getHttpServer())
      .post('/api/purchases')
      .set(await SIGNER_A.headers())
      .send({ buyer: SIGNER_A.address, itemId: 7, quantity: 2, value: '4' })
      .expect(201);

    const res = await request(ctx.app.getHttpServer())
      .get(`/api/funding/balances/${SIGNER_A.address}`)
      .query({ itemId: 7 })
      .expect(200);
    expect(res.body).toEqual({
      holder: SIGNER_A.address,
      native: '5',
      token: null,
      item: { ledger: ctx.assets.address, itemId: 7, balance: 2 },
    });
    expect(ctx.native.balanceOf(RECIPIENT)).toBe(4n);
  });

  it('should let a signed buyer approve the engine', async () => {
    await admin('/api/funding/token-mints')
      .send({ token: TOKEN_T, to: SIGNER_B.address, amount: '50' })
      .expect(201);

    const res = await request(ctx.app.getHttpServer())
      .put(`/api/funding/allowances/${TOKEN_T}`)
      .set(await SIGNER_B.headers())
      .send({ amount: '30' })
      .expect(200);

    expect(res.body).toEqual({
      token: TOKEN_T,
      owner: SIGNER_B.address,
      spender: ENGINE,
      amount: '30',
    });
    expect(ctx.tokens.allowance(TOKEN_T, SIGNER_B.address, ENGINE)).toBe(30n);
    expect(ctx.sink.events.map((event) => event.type)).toEqual([
      'TokensMinted',
      'AllowanceApproved',
    ]);
  });

  it('should refuse an unsigned approval', async () => {
    await request(ctx.app.getHttpServer())
      .put(`/api/funding/allowances/${TOKEN_T}`)
      .send({ amount: '30' })
      .expect(401);
  });

  it('should keep minting behind the admin key', async () => {
    await request(ctx.app.getHttpServer())
      .post('/api/funding/native-deposits')
      .send({ to: SIGNER_A.address, amount: '9' })
      .expect(401);

    expect(ctx.native.balanceOf(SIGNER_A.address)).toBe(0n);
  });

  it('should answer a zero deposit with its code', async () => {
    const res = await admin('/api/funding/native-deposits')
      .send({ to: SIGNER_A.address, amount: '0' })
      .expect(400);

    expect(res.body.code).toBe('ZERO_AMOUNT');
  });
});
