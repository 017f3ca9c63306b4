/** Injection token for the wall clock. */
export const CLOCK = 'CLOCK';

/** Injection token for the sink that receives the events of committed requests. */
export const SALE_EVENT_SINK = 'SALE_EVENT_SINK';

/** `paymentToken` value denoting the native currency. */
export const NATIVE_CURRENCY = '0x0000000000000000000000000000000000000000';

export const MAX_BATCH_SIZE = 50;
