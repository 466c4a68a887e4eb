// src/components/builtin/index.ts

/**
 * Registration list for the components compiled into the runtime.
 * Order here is the order in which they are registered and advertised.
 */

import type { ComponentDefinition } from '../domain/Capability';
import { echoCounterComponent } from './EchoCounterComponent';
import {
  listDirectoryComponent,
  readFileComponent,
  writeFileComponent,
} from './FileSystemComponents';
import { knowledgeBaseComponent } from './KnowledgeBaseComponent';
import { logMessageComponent } from './LogMessageComponent';
import { weatherComponent } from './WeatherComponent';

export const builtinComponents: readonly ComponentDefinition[] = [
  logMessageComponent,
  echoCounterComponent,
  weatherComponent,
  knowledgeBaseComponent,
  readFileComponent,
  writeFileComponent,
  listDirectoryComponent,
];
