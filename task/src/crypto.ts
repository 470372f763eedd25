import { getAddress, isAddress, isHex, verifyMessage, type Address } from 'viem';
import { invalidInput } from './errors.js';

export const normalizeAddress = (address: string): Address => {
  if (!isAddress(address, { strict: false })) {
    throw invalidInput(`Invalid address ${address}`);
  }
  return getAddress(address);
};

export const verifyDetachedSignature = async (
  address: Address,
  payload: string,
  signature: string
): Promise<boolean> => {
  if (!isHex(signature)) {
    return false;
  }
  try {
    return await verifyMessage({ address, message: payload, signature });
  } catch {
    return false;
  }
};
