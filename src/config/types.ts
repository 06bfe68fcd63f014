import { LogThreshold } from "../observability/types";
import { Profile } from "../types/models";

export interface SizeControlSettings {
  maxBlockLines: number;
  keepLines: number;
}

export interface SearchSettings {
  titleWeight: number;
  previewRadius: number;
  defaultLimit: number;
  maxLimit: number;
}

export interface AppConfig {
  outputDir: string;
  profile: Profile;
  concurrency: number;
  includeExtensions: string[];
  excludeDirs: string[];
  recognizedWrappers: string[];
  boilerplateDenylist: string[];
  sizeControl: Record<Exclude<Profile, "lossless">, SizeControlSettings>;
  search: SearchSettings;
  queryTimeoutMs: number;
  pruneStale: boolean;
  logLevel: LogThreshold;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "sizeControl" | "search">> & {
  sizeControl?: Partial<Record<Exclude<Profile, "lossless">, Partial<SizeControlSettings>>>;
  search?: Partial<SearchSettings>;
};
