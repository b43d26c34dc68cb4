import crypto from 'crypto';

/**
 * Keyed digest of a PIN. Deterministic so that a login is a single indexed
 * lookup; the pepper keeps a leaked table from being reversed by brute
 * force over the small PIN space without the server secret.
 */
export const digestPin = (pin: string, pepper: string): string => {
  return crypto.createHmac('sha256', pepper).update(pin, 'utf8').digest('hex');
};

/**
 * Bind a pepper once, for injection into the ledger
 */
export const createPinDigester = (pepper: string) => {
  if (!pepper) {
    throw new Error('A credential pepper is required');
  }
  return (pin: string): string => digestPin(pin, pepper);
};
