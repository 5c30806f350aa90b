// client system architecture codes from option 93 (rfc 4578 / iana processor architecture types)
export const Arch = {
  INTEL_X86PC: 0,
  NEC_PC98: 1,
  EFI_ITANIUM: 2,
  DEC_ALPHA: 3,
  ARC_X86: 4,
  INTEL_LEAN_CLIENT: 5,
  EFI_IA32: 6,
  EFI_BC: 7,
  EFI_XSCALE: 8,
  EFI_X86_64: 9,
  EFI_ARM32: 10,
  EFI_ARM64: 11
} as const;

const ARCH_NAMES = new Map<number, string>(Object.entries(Arch).map(([name, code]) => [code, name]));

export function archName(code: number): string {
  return ARCH_NAMES.get(code) ?? 'unknown';
}
