import { describe, expect, test } from 'vitest';
import { Logger } from '../logger';
import { BaseUnit } from './base-unit';
import type { UnitCollaborators } from './base-unit';
import type { UnitOptions } from './types';
import {
  FakePackageInstaller,
  FakeServiceController,
  TestPlugin,
  createTestUnit,
} from './test-units';
import { StaticRelationView } from './relations';
import { MemoryStateStore } from './state-store';
import { UnitConfig } from './config';
import { InvalidUnitNameError, InvalidUnitOptionsError } from './errors';
import { waitingStatus } from './status';

const collaborators = (): UnitCollaborators => ({
  serviceController: new FakeServiceController(),
  packageInstaller: new FakePackageInstaller(),
  relations: new StaticRelationView(),
  stateStore: new MemoryStateStore(),
});

class PlainUnit extends BaseUnit {
  constructor(options: UnitOptions, deps: UnitCollaborators = collaborators()) {
    super(Logger.createTestOptimizedLogger().logger, options, deps);
  }
}

/**
 * Intermediate base shared by several units, registering on the framework layer
 */
class SharedBaseUnit extends BaseUnit {
  constructor(options: UnitOptions) {
    super(Logger.createTestOptimizedLogger().logger, options, collaborators());
    this.registerStatusCheck('shared-check', () => null, 'framework');
  }
}

class LeafUnit extends SharedBaseUnit {
  constructor() {
    super({ name: 'leaf' });
    this.registerStatusCheck('leaf-check', () => waitingStatus('leaf'));
  }
}

describe('BaseUnit', () => {
  describe('Declaration', () => {
    test('should apply defaults for omitted options', () => {
      const unit = new PlainUnit({ name: 'plain' });

      expect(unit.name).toBe('plain');
      expect(unit.packages).toEqual([]);
      expect(unit.requiredRelations).toEqual([]);
      expect(unit.services()).toEqual([]);
      expect(unit.getConfig().isDeclared('source')).toBe(false);
    });

    test('should expose the services of its restart map', () => {
      const { unit } = createTestUnit();

      expect(unit.services()).toEqual(['apache2', 'ks-api']);
      expect(unit.registry.servicesForFiles(['f1'])).toEqual(['apache2']);
    });

    test('should reject a name that is not kebab-case', () => {
      expect(() => new PlainUnit({ name: 'Test_API' })).toThrow(InvalidUnitNameError);
      expect(() => new PlainUnit({ name: 'Test_API' })).toThrow(
        'Invalid unit name: "Test_API". Unit names must be kebab-case (lowercase letters, numbers, and hyphens only).',
      );
    });

    test('should reject malformed options', () => {
      const create = (): PlainUnit => new PlainUnit({ name: 'plain', packages: [''] });

      expect(create).toThrow(InvalidUnitOptionsError);
      expect(create).toThrow(
        'Invalid options for unit "plain": packages.0: String must contain at least 1 character(s)',
      );
    });

    test('should use the config it was given', () => {
      const config = new UnitConfig({ source: 'cloud:test-pocket' });
      const unit = new PlainUnit({ name: 'plain' }, { ...collaborators(), config });

      expect(unit.getConfig()).toBe(config);
    });
  });

  describe('Status checks', () => {
    test('should order framework, unit and plugin checks', () => {
      const unit = new LeafUnit().use(new TestPlugin());

      expect(unit.chain.checks().map(({ name, layer }) => `${layer}:${name}`)).toEqual([
        'framework:shared-check',
        'unit:leaf-check',
        'plugin:plugin-check',
      ]);
      expect(unit.getPluginNames()).toEqual(['test-plugin']);
    });

    test('should evaluate against the current flags', async () => {
      const { unit, relations } = createTestUnit();

      relations.set('shared-db', 1);
      await unit.begin();
      await unit.lifecycle.install();

      expect(await unit.evaluateStatus()).toEqual({
        status: { severity: 'active', message: 'Unit is ready' },
        decidedBy: 'ready',
      });
      expect(unit.customCheckRuns).toBe(1);
    });

    test('should skip custom checks until the unit is started', async () => {
      const { unit } = createTestUnit({ relations: { 'shared-db': 1 } });
      await unit.begin();

      const verdict = await unit.evaluateStatus();

      expect(verdict.decidedBy).toBe('not-started');
      expect(unit.customCheckRuns).toBe(0);
    });

    test('should give plugins a scoped logger and the unit config', () => {
      const { unit, logger, arraySink } = createTestUnit();
      const plugin = {
        name: 'probe',
        setup: (context: Parameters<TestPlugin['setup']>[0]): void => {
          context.logger.info('Unit {{unit}} has source {{source}}', {
            params: { unit: context.unitName, source: context.config.get('source') },
          });
        },
      };

      unit.getConfig().update({ source: 'cloud:test-pocket' });
      unit.use(plugin);

      expect(arraySink.logs.at(-1)?.serviceName).toBe('unit:test-api:probe');
      expect(arraySink.logs.at(-1)?.message).toBe(
        'Unit test-api has source cloud:test-pocket',
      );
      expect(logger).toBeInstanceOf(Logger);
    });
  });
});
