/**
 * Built-in NPC catalog, in assignment order
 */

import type { Persona } from '../types/npc.js';

export const DEFAULT_PERSONAS: readonly Persona[] = [
  {
    key: 'village_guard',
    name: 'Marcus',
    role: 'Village Guard',
    background: 'A veteran soldier who protects the village',
    quirks: ['Always mentions his war stories', 'Suspicious of strangers'],
  },
  {
    key: 'merchant',
    name: 'Elena',
    role: 'Merchant',
    background: 'A traveling trader with exotic goods',
    quirks: ['Always trying to make a sale', 'Knows gossip from other towns'],
  },
  {
    key: 'blacksmith',
    name: 'Thorin',
    role: 'Blacksmith',
    background: 'Master craftsman who forges weapons and tools',
    quirks: ['Speaks in short sentences', 'Proud of his work'],
  },
];
