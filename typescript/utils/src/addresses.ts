import { utils as ethersUtils } from 'ethers';

const EVM_ADDRESS_REGEX = /^0x[a-fA-F0-9]{40}$/;

export function isAddressEvm(address: string) {
  return EVM_ADDRESS_REGEX.test(address);
}

// Checks the format and, for mixed-case input, the EIP-55 checksum
export function isValidAddressEvm(address: string) {
  // Need to catch because ethers' isAddress throws in some cases (bad checksum)
  try {
    const isValid = isAddressEvm(address) && ethersUtils.isAddress(address);
    return !!isValid;
  } catch {
    return false;
  }
}
