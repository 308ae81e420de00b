/**
 * Register name sets and their encodings.
 *
 * `AT` (R1) is not in the user-addressable general set: it is the scratch
 * register the assembler uses when it synthesizes address loads.
 */
export type RegisterClass = 'general' | 'float' | 'system';

/** Scratch register used by address synthesis and the overrides that need a temporary. */
export const SCRATCH_REGISTER = 'AT';

const GENERAL_ALIASES: readonly string[] = [
  'ZERO',
  'AT',
  'V0',
  'V1',
  'A0',
  'A1',
  'A2',
  'A3',
  'T0',
  'T1',
  'T2',
  'T3',
  'T4',
  'T5',
  'T6',
  'T7',
  'S0',
  'S1',
  'S2',
  'S3',
  'S4',
  'S5',
  'S6',
  'S7',
  'T8',
  'T9',
  'K0',
  'K1',
  'GP',
  'SP',
  'FP',
  'RA',
];

const SYSTEM_NAMES: readonly string[] = [
  'INDEX',
  'RANDOM',
  'ENTRYLO0',
  'ENTRYLO1',
  'CONTEXT',
  'PAGEMASK',
  'WIRED',
  '',
  'BADVADDR',
  'COUNT',
  'ENTRYHI',
  'COMPARE',
  'STATUS',
  'CAUSE',
  'EPC',
  'PRID',
  'CONFIG',
  'LLADDR',
  'WATCHLO',
  'WATCHHI',
  'XCONTEXT',
  '',
  '',
  '',
  '',
  '',
  'PERR',
  'CACHEERR',
  'TAGLO',
  'TAGHI',
  'ERROREPC',
  '',
];

function buildNumbers(): Map<string, { number: number; cls: RegisterClass }> {
  const out = new Map<string, { number: number; cls: RegisterClass }>();
  for (let n = 0; n < 32; n++) {
    out.set(`R${n}`, { number: n, cls: 'general' });
    out.set(`F${n}`, { number: n, cls: 'float' });
  }
  GENERAL_ALIASES.forEach((name, n) => out.set(name, { number: n, cls: 'general' }));
  // S8 is another spelling of FP.
  out.set('S8', { number: 30, cls: 'general' });
  SYSTEM_NAMES.forEach((name, n) => {
    if (name) out.set(name, { number: n, cls: 'system' });
  });
  return out;
}

const registerNumbers = buildNumbers();

function classSet(cls: RegisterClass): ReadonlySet<string> {
  const names = new Set<string>();
  for (const [name, info] of registerNumbers) {
    if (info.cls === cls) names.add(name);
  }
  if (cls === 'general') {
    names.delete(SCRATCH_REGISTER);
    names.delete('R1');
  }
  return names;
}

/**
 * Register names a program may write, partitioned by class.
 */
export const registerSets: Readonly<Record<RegisterClass, ReadonlySet<string>>> = {
  general: classSet('general'),
  float: classSet('float'),
  system: classSet('system'),
};

/**
 * Class of a user-addressable register name (case-insensitive), or `undefined`.
 */
export function registerClassOf(name: string): RegisterClass | undefined {
  const upper = name.toUpperCase();
  for (const cls of ['general', 'float', 'system'] as const) {
    if (registerSets[cls].has(upper)) return cls;
  }
  return undefined;
}

/**
 * 5-bit encoding of any known register name, scratch register included.
 */
export function registerNumber(name: string): number | undefined {
  return registerNumbers.get(name.toUpperCase())?.number;
}
