import type { TutorRuntime, TutorRuntimeOptions } from '../lib/runtime.js';

export type RuntimeFactory = (options: TutorRuntimeOptions) => TutorRuntime;
