export const SALE_EVENTS_QUEUE = 'sale-events';
