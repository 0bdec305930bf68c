import * as fs from 'fs/promises';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_PERSONAS } from '../data/personas.js';
import type { Persona } from '../types/npc.js';

const logger = createLogger('persona-registry');

const PersonaSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  role: z.string().min(1),
  background: z.string().min(1),
  quirks: z.array(z.string()).default([]),
});

const PersonaFileSchema = z.object({
  personas: z.array(PersonaSchema).min(1),
});

/**
 * Fixed catalog of personas plus the player -> persona assignment table.
 *
 * Assignment is round-robin on the numeric player id, not on arrival order,
 * so the same id always lands on the same persona for a given catalog.
 */
export class PersonaRegistry {
  private readonly personas: Map<string, Persona>;
  private readonly assignments = new Map<number, string>();

  constructor(personas: readonly Persona[] = DEFAULT_PERSONAS) {
    if (personas.length === 0) {
      throw new ConfigError('Persona registry needs at least one persona');
    }

    this.personas = new Map();
    for (const persona of personas) {
      if (this.personas.has(persona.key)) {
        throw new ConfigError(`Duplicate persona key: ${persona.key}`);
      }
      this.personas.set(persona.key, Object.freeze({ ...persona, quirks: [...persona.quirks] }));
    }
  }

  get size(): number {
    return this.personas.size;
  }

  keys(): string[] {
    return [...this.personas.keys()];
  }

  get(key: string): Persona {
    const persona = this.personas.get(key);
    if (!persona) {
      throw new ConfigError(`Unknown persona: ${key}`);
    }
    return persona;
  }

  /**
   * Persona key for a player. Memoized on first call and never changed after.
   */
  assign(playerId: number): string {
    const existing = this.assignments.get(playerId);
    if (existing !== undefined) {
      return existing;
    }

    const keys = this.keys();
    // Non-negative modulo so negative ids still map into the catalog
    const index = ((playerId % keys.length) + keys.length) % keys.length;
    const key = keys[index];
    this.assignments.set(playerId, key);

    logger.debug({ playerId, persona: key }, 'Persona assigned');
    return key;
  }

  /**
   * Assignments made so far, in first-seen order
   */
  getAssignments(): ReadonlyMap<number, string> {
    return this.assignments;
  }
}

/**
 * Parse a YAML persona catalog:
 *
 * personas:
 *   - key: innkeeper
 *     name: Berta
 *     ...
 */
export function parsePersonasYaml(content: string, source = 'personas file'): Persona[] {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigError(`Invalid YAML in ${source}: ${message}`);
  }

  const parsed = PersonaFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid persona catalog in ${source}: ${details}`);
  }

  return parsed.data.personas;
}

export async function loadPersonasFile(filePath: string): Promise<Persona[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Personas file not found: ${filePath}`);
    }
    throw error;
  }

  const personas = parsePersonasYaml(content, filePath);
  logger.info({ filePath, count: personas.length }, 'Personas loaded from file');
  return personas;
}
