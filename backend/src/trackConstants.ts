export interface TrackConstants {
  venue: string | null;
  pitLoss: number;
  degFactor: number;
}

const TRACK_TABLE: ReadonlyArray<{ venue: string; pitLoss: number; degFactor: number }> = [
  { venue: "Monaco", pitLoss: 25, degFactor: 0.8 },
  { venue: "Monza", pitLoss: 24, degFactor: 0.7 },
  { venue: "Silverstone", pitLoss: 23, degFactor: 1.1 },
  { venue: "Bahrain", pitLoss: 22.5, degFactor: 1.4 },
  { venue: "Spa", pitLoss: 21, degFactor: 1 },
  { venue: "Montreal", pitLoss: 18, degFactor: 0.9 },
  { venue: "Suzuka", pitLoss: 22, degFactor: 1.2 },
  { venue: "Singapore", pitLoss: 28, degFactor: 0.9 }
];

export const DEFAULT_TRACK_CONSTANTS: TrackConstants = { venue: null, pitLoss: 22, degFactor: 1 };

export function lookupTrackConstants(venueName: string): TrackConstants {
  const needle = venueName.toLowerCase();
  // First table entry contained in the name wins.
  const match = TRACK_TABLE.find((entry) => needle.includes(entry.venue.toLowerCase()));
  return match ? { ...match } : { ...DEFAULT_TRACK_CONSTANTS };
}

export function listTrackConstants(): TrackConstants[] {
  return TRACK_TABLE.map((entry) => ({ ...entry }));
}
