/**
 * PaySeal - payment channel signing and notification verification
 *
 * Canonicalizes, signs and verifies payment provider messages across
 * form, XML and JSON channels.
 */

export * from './payseal';
