import { LogLevel } from '../utils/Logger';
import { ServiceSpec } from './Service';
import { ToolRecipe } from './Installer';

export interface StackupSettings {
  logLevel: LogLevel;
  stateDir: string;
  logDir: string;
}

export interface Manifest {
  path: string;
  name: string;
  settings: StackupSettings;
  setupTools: string[];
  tools: ToolRecipe[];
  services: ServiceSpec[];
}
