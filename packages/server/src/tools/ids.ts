import * as crypto from 'node:crypto';

/** Produces a result id for an action, e.g. `store_1a2b3c4d`. */
export type IdGenerator = (action: string) => string;

/**
 * Random 8-hex suffix per call. No collision check: ids are for
 * correlating a response, not for addressing stored data.
 */
export const randomId: IdGenerator = (action) =>
    `${action}_${crypto.randomBytes(4).toString('hex')}`;

/** Seconds since the epoch. */
export type Clock = () => number;

export const epochSeconds: Clock = () => Math.floor(Date.now() / 1000);
