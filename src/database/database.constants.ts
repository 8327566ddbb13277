export const TRACKER_DB = Symbol('TRACKER_DB');
export const PRICES_DB = Symbol('PRICES_DB');
