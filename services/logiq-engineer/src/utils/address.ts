import type { Address, ServiceAddress } from '../types/index.js';

/** One-line address as accepted by the geocoding and directions APIs. */
export function formatAddress(address: Address): string {
  return [address.street, address.city, address.district, `${address.state} ${address.zipCode}`.trim(), address.country]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(', ');
}

export function formatServiceAddress(address: ServiceAddress, country = 'India'): string {
  return formatAddress({ ...address, zipCode: address.zipcode, country });
}
