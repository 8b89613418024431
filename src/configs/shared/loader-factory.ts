import process from "node:process";

import { isMissing, readUtf8File } from "../../utils/fs.js";

export type ReadFileFn = (path: string) => string;

export interface BaseConfigLoaderOptions {
  root?: string;
  filePath?: string;
}

export interface ConfigLoaderContext<TOptions extends BaseConfigLoaderOptions> {
  root: string;
  filePath: string;
  options: Readonly<TOptions>;
}

export interface ConfigLoaderDefinition<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
> {
  resolveFilePath: (root: string, options: Readonly<TOptions>) => string;
  selectReadFile?: (options: Readonly<TOptions>) => ReadFileFn | undefined;
  handleMissing: (context: ConfigLoaderContext<TOptions>) => TResult;
  parse: (content: string, context: ConfigLoaderContext<TOptions>) => TResult;
  prepareContent?: (
    content: string,
    context: ConfigLoaderContext<TOptions>,
  ) => string;
}

export type ConfigLoader<TOptions extends BaseConfigLoaderOptions, TResult> = (
  options: TOptions,
) => TResult;

export function createConfigLoader<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
>(
  definition: ConfigLoaderDefinition<TResult, TOptions>,
): ConfigLoader<TOptions, TResult> {
  return (options) => {
    const root = options.root ?? process.cwd();
    const filePath = definition.resolveFilePath(root, options);
    const context: ConfigLoaderContext<TOptions> = {
      root,
      filePath,
      options,
    };

    const readFileOverride = definition.selectReadFile?.(options);
    const readFile = readFileOverride ?? defaultReadFile;

    let content: string;
    try {
      content = readFile(filePath);
    } catch (error) {
      if (isMissing(error)) {
        return definition.handleMissing(context);
      }
      throw error;
    }

    const prepared = definition.prepareContent
      ? definition.prepareContent(content, context)
      : content;

    return definition.parse(prepared, context);
  };
}

function defaultReadFile(path: string): string {
  return readUtf8File(path, "utf8");
}
