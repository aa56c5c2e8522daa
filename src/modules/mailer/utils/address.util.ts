import { MailAddress } from '../interfaces/message.interface';

/**
 * Formats an address as `"Name" <address>`, or the bare address when it has
 * no name.
 */
export function formatAddress(address: MailAddress): string {
  if (!address.name) {
    return address.address;
  }

  const name = address.name.replace(/(["\\])/g, '\\$1');
  return `"${name}" <${address.address}>`;
}

export function addressesToStrings(
  addresses: MailAddress[] = [],
  withName = false,
): string[] {
  return addresses.map((address) =>
    withName ? formatAddress(address) : address.address,
  );
}
