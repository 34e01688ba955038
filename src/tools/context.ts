/**
 * Dependencies shared by the command handlers
 */

import type { PortbankConfig } from '../config/index.js';
import type { PipelineIO } from '../pipeline/renderTable.js';

export interface ToolContext {
  config: PortbankConfig;
  io?: PipelineIO;
  now?: Date;
}
