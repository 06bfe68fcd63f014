import { SizeControlSettings } from "../config/types";
import { PassName, Profile, SourceOrigin, TransformWarning } from "../types/models";

export interface NormalizeSettings {
  profile: Profile;
  recognizedWrappers: readonly string[];
  boilerplateDenylist: readonly string[];
  sizeControl?: SizeControlSettings;
}

export interface PassContext {
  origin: SourceOrigin;
  path: string;
  settings: NormalizeSettings;
}

export interface PassResult {
  text: string;
  warnings: TransformWarning[];
}

export type TransformPass = (text: string, context: PassContext) => PassResult;

export interface NamedPass {
  name: PassName;
  run: TransformPass;
}
