import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { DEFAULT_RULES, GameContext, GameObject } from '@verbforge/engine';
import { ConfigError, loadEntityFile, loadEntityInto, loadRulesConfig } from './loaders.js';

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe('loadEntityFile', () => {
  it('parses a definition file', () => {
    const hero = loadEntityFile(fixture('hero.dat'));

    expect(hero.name).toBe('Hero');
    expect(hero.description).toBe('a wandering swordsman');
    expect(hero.attributes).toEqual({
      HP: 20,
      LIFE: 20,
      ACCURACY: 10,
      EVASION: 30,
      'EVASION.slash': 10,
      PROTECTION: 1,
      'POWER.SEARCH': 25,
      INTERACTIONS: 'greet,trade',
    });
    expect(hero.objects).toEqual([
      {
        name: 'long sword',
        attributes: {
          ACTIONS: 'ATTACK.slash,ATTACK.thrust',
          'ACCURACY.slash': 5,
          'DAMAGE.slash': 'D8',
          'DAMAGE.thrust': '2D4+1',
        },
        objects: [],
      },
    ]);
  });

  it('populates an existing entity', () => {
    const local = loadEntityInto(fixture('town-square.dat'), new GameContext());

    expect(local.name).toBe('town square');
    expect(local.getInteger('RESISTANCE.MENTAL')).toBe(10);
    expect(local.objects.map((thing) => thing.name)).toEqual(['bench', 'trap-door']);
    expect(local.objects[0]).toBeInstanceOf(GameObject);
    expect(local.getObjects(true).map((thing) => thing.name)).toEqual(['trap-door']);
  });
});

describe('loadRulesConfig', () => {
  it('merges overrides over the defaults', () => {
    expect(loadRulesConfig(fixture('rules.json'))).toEqual({
      ...DEFAULT_RULES,
      lifeAttribute: 'VIGOR',
      baseToHit: 50,
    });
  });

  it('rejects a file that does not match the schema', () => {
    expect(() => loadRulesConfig(fixture('bad-rules.json'))).toThrow(ConfigError);
  });

  it('reports every schema violation', () => {
    try {
      loadRulesConfig(fixture('bad-rules.json'));
      expect.unreachable('loadRulesConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe('INVALID_CONFIG');
        expect(error.details?.errors).toHaveLength(2);
      }
    }
  });
});
