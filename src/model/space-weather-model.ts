export type IndexSample = {
  timestamp: number; // epoch ms, UTC
  value: number;
  kind?: "observed" | "estimated" | "predicted";
};

export type SkySample = {
  timestamp: number; // epoch ms, UTC
  isNight: boolean;
  cloudFraction: number; // 0..100
};
