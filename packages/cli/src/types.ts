export interface SegmentOptions {
  command: "segment";
  codes: string;
  separator: string;
  ignore: string[];
}

export interface JoinOptions {
  command: "join";
  separator: string;
}

export interface HelpOptions {
  command: "help";
}

export type CliOptions = SegmentOptions | JoinOptions | HelpOptions;

export const DEFAULT_OPTIONS = {
  separator: "@@",
} as const;

export interface ProcessingStats {
  lines: number;
  durationMS: number;
}
