export const DIFFICULTY_IDS = ['casual', 'standard', 'hard', 'insane'] as const;
export type DifficultyId = (typeof DIFFICULTY_IDS)[number];

export interface Difficulty {
  id: DifficultyId;
  label: string;
  gravityMs: number;
}

export const DIFFICULTIES: Difficulty[] = [
  { id: 'casual', label: 'Casual', gravityMs: 750 },
  { id: 'standard', label: 'Standard', gravityMs: 600 },
  { id: 'hard', label: 'Hard', gravityMs: 480 },
  { id: 'insane', label: 'Insane', gravityMs: 380 },
];

export function isDifficultyId(value: unknown): value is DifficultyId {
  return (
    typeof value === 'string' &&
    (DIFFICULTY_IDS as readonly string[]).includes(value)
  );
}

export function getDifficulty(id: string): Difficulty {
  const normalized = id.trim().toLowerCase();
  return DIFFICULTIES.find((d) => d.id === normalized) ?? DIFFICULTIES[1];
}
