// This module wires every built-in tool into one registry builder during startup.

import type { ToolRegistryBuilder } from '../tool-registry.js';
import { type LocaleDateTimeToolOptions, registerLocaleDateTimeTool } from './locale-date-time.js';
import { type WikipediaPagesToolOptions, registerWikipediaPagesTool } from './wikipedia-pages.js';

export interface BuiltinToolOptions {
  localeDateTime?: LocaleDateTimeToolOptions;
  wikipediaPages?: WikipediaPagesToolOptions;
}

export function registerBuiltinTools(builder: ToolRegistryBuilder, options: BuiltinToolOptions = {}): ToolRegistryBuilder {
  registerLocaleDateTimeTool(builder, options.localeDateTime);
  registerWikipediaPagesTool(builder, options.wikipediaPages);
  return builder;
}
