// Two fixed 8-entry tables; a name is PREFIXES[i] + SUFFIXES[j] with no separator.

export const NAME_PREFIXES = [
  'Flame',
  'Aqua',
  'Leaf',
  'Volt',
  'Mind',
  'Shadow',
  'Drake',
  'Wild',
] as const;

export const NAME_SUFFIXES = [
  'mon',
  'chu',
  'zard',
  'rex',
  'wing',
  'claw',
  'tail',
  'fang',
] as const;
