import type { Config } from '../../config/index.js';
import type { WaveName } from '../../types/extraction.types.js';
import type { ProcessingStrategy } from '../routing/types.js';

export interface WaveDefinition {
  name: Exclude<WaveName, 'relationships' | 'pattern'>;
  label: string;
  focus: string;
  entityTypes: string[];
}

/**
 * Entity waves for a strategy, in execution order. The relationship wave is
 * driven separately by the routing decision.
 */
export function wavesFor(strategy: ProcessingStrategy, waves: Config['extraction']['waves']): WaveDefinition[] {
  if (strategy === 'single_pass') {
    return [
      {
        name: 'single_pass',
        label: 'All Entity Types',
        focus: 'every party, court, citation and legal concept mentioned in the text',
        entityTypes: [...new Set([...waves.actors, ...waves.citations, ...waves.concepts])],
      },
    ];
  }

  return [
    {
      name: 'actors',
      label: 'Actors and Parties',
      focus: 'the people, parties, attorneys, judges and courts involved',
      entityTypes: [...waves.actors],
    },
    {
      name: 'citations',
      label: 'Legal Citations',
      focus: 'citations to cases, statutes and regulations',
      entityTypes: [...waves.citations],
    },
    {
      name: 'concepts',
      label: 'Legal Concepts',
      focus: 'legal doctrines, procedural terms and other legal concepts',
      entityTypes: [...waves.concepts],
    },
  ];
}
