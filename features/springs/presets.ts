export interface SpringPreset {
  dampingRatio: number;
  /** Undamped frequency, Hz. */
  frequency: number;
}

export type PresetName = "gentle" | "responsive" | "snappy" | "bouncy" | "wobbly" | "sluggish" | "instant";

export const springPresets: Record<PresetName, SpringPreset> = {
  gentle: { dampingRatio: 1, frequency: 1.5 },
  responsive: { dampingRatio: 1, frequency: 4 },
  snappy: { dampingRatio: 0.9, frequency: 6 },
  // Visible overshoot
  bouncy: { dampingRatio: 0.5, frequency: 3 },
  wobbly: { dampingRatio: 0.3, frequency: 2 },
  sluggish: { dampingRatio: 2, frequency: 1 },
  instant: { dampingRatio: 1, frequency: Infinity },
};
