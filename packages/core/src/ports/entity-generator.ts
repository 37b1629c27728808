import type { EntityAssembly } from '../models/index.js';

export interface GeneratedFile {
  readonly path: string;
  readonly content: string;
}

export interface GeneratorOutput {
  readonly files: readonly GeneratedFile[];
}

export interface EntityGeneratorPort {
  readonly id: string;
  readonly displayName: string;
  generate(assembly: EntityAssembly): GeneratorOutput | Promise<GeneratorOutput>;
}
