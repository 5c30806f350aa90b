// hardware addresses are keyed as lowercase colon-hex, e.g. a4:bf:01:2e:7f:aa

const SEPARATORS = /[:\-.]/g;
const HEX = /^[0-9a-f]+$/;

export function formatHardwareAddress(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join(':');
}

// accepts colon, dash, cisco-dot or bare hex forms; null if it isn't a hardware address
export function normalizeHardwareAddress(input: string): string | null {
  const hex = input.trim().toLowerCase().replace(SEPARATORS, '');
  if (hex.length < 2 || hex.length % 2 !== 0 || !HEX.test(hex)) {
    return null;
  }
  const pairs: string[] = [];
  for (let i = 0; i < hex.length; i += 2) {
    pairs.push(hex.slice(i, i + 2));
  }
  return pairs.join(':');
}
