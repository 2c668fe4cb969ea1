/**
 * Email address parsing
 */
import { z } from 'zod';
import type { AddressList } from '../types/email.js';

const AddressSchema = z.string().email();

/**
 * Matches `Display Name <user@example.com>`
 */
const NAMED_ADDRESS = /^(.*?)\s*<([^<>]+)>\s*$/;

/**
 * Normalizes a single address or a list of addresses to a list
 */
export function toAddressArray(list: AddressList | undefined): string[] {
  if (list === undefined) {
    return [];
  }
  return typeof list === 'string' ? [list] : [...list];
}

/**
 * Extracts the bare mailbox from an address that may carry a display name
 */
export function extractMailbox(address: string): string {
  const match = NAMED_ADDRESS.exec(address);
  return (match?.[2] ?? address).trim();
}

/**
 * Checks whether an address is well formed
 */
export function isValidAddress(address: string): boolean {
  if (address.trim().length === 0) {
    return false;
  }
  return AddressSchema.safeParse(extractMailbox(address)).success;
}
