import { buildSignatureStoragePath, buildStoragePath } from "../../media/storage-path";
import { loadCommandConfig, resolvePrefix, type CommonOptions } from "./context";

export interface PathOptions extends CommonOptions {
  video?: boolean;
  index?: number;
}

export function runPath(name: string, options: PathOptions): void {
  const config = loadCommandConfig(options.config);
  if (!config) {
    return;
  }
  const prefix = resolvePrefix(options, config);
  console.log(buildStoragePath(prefix, name, options.video ?? false, options.index));
}

export function runSignaturePath(options: CommonOptions): void {
  const config = loadCommandConfig(options.config);
  if (!config) {
    return;
  }
  console.log(buildSignatureStoragePath(resolvePrefix(options, config)));
}
