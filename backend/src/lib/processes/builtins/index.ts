import type { ProcessDefinition } from '../types.js';
import { bboxProcess } from './bbox.js';
import { echoProcess } from './echo.js';
import { sleepProcess } from './sleep.js';

export const builtinProcesses: readonly ProcessDefinition[] = [echoProcess, sleepProcess, bboxProcess];
