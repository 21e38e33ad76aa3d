import { describe, it, expect, beforeEach } from 'vitest';
import { InheritanceResolver } from '../../src/services/InheritanceResolver.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import {
  MockControlRepository,
  MockInheritanceRepository,
} from '../mocks/MockCatalogRepositories.js';

describe('InheritanceResolver', () => {
  let inheritance: MockInheritanceRepository;
  let controls: MockControlRepository;
  let log: ConsoleLogProvider;
  let resolver: InheritanceResolver;

  beforeEach(() => {
    inheritance = new MockInheritanceRepository();
    controls = new MockControlRepository();
    log = new ConsoleLogProvider();
    resolver = new InheritanceResolver(inheritance, controls, log);
  });

  describe('resolve', () => {
    it('should return one record per declared provider in declaration order', async () => {
      inheritance.add('AC-2', 'Cloud Platform', 'shared');
      inheritance.add('AC-2', 'Cloud Platform', 'Inherited', 'Managed by the platform.');
      inheritance.add('AC-2', 'Office Suite', 'customer');
      inheritance.add('AC-2', 'Undeclared Host', 'inherited');

      const records = await resolver.resolve('AC-2', [
        'Office Suite',
        'Cloud Platform',
        'Office Suite',
      ]);

      expect(records).toEqual([
        {
          controlId: 'AC-2',
          provider: 'Office Suite',
          responsibility: 'Customer-responsibility',
          narrative: null,
        },
        {
          controlId: 'AC-2',
          provider: 'Cloud Platform',
          responsibility: 'Inherited',
          narrative: 'Managed by the platform.',
        },
      ]);
    });

    it('should return nothing when no provider is declared', async () => {
      inheritance.add('AC-2', 'Cloud Platform', 'inherited');
      await expect(resolver.resolve('AC-2', [])).resolves.toEqual([]);
    });

    it('should skip and log an unrecognised responsibility', async () => {
      inheritance.add('AC-2', 'Cloud Platform', 'partially');

      const records = await resolver.resolve('AC-2', ['Cloud Platform']);

      expect(records).toEqual([]);
      expect(log.find('inheritance.unknown_responsibility')[0].fields).toEqual({
        controlId: 'AC-2',
        provider: 'Cloud Platform',
        responsibility: 'partially',
      });
    });

    it('should not treat object prototype keys as responsibilities', async () => {
      inheritance.add('AC-2', 'Cloud Platform', 'constructor');
      await expect(resolver.resolve('AC-2', ['Cloud Platform'])).resolves.toEqual([]);
    });
  });

  describe('findInherited', () => {
    it('should pick the first fully inherited record', async () => {
      inheritance.add('SC-7', 'Office Suite', 'shared');
      inheritance.add('SC-7', 'Cloud Platform', 'inherited');

      const records = await resolver.resolve('SC-7', ['Office Suite', 'Cloud Platform']);

      expect(resolver.findInherited(records)?.provider).toBe('Cloud Platform');
    });

    it('should return null when nothing is inherited', () => {
      expect(resolver.findInherited([])).toBeNull();
    });
  });

  describe('summarize', () => {
    it('should count the strongest responsibility per mapped control', async () => {
      controls.add({ id: 'AC-2' });
      controls.add({ id: 'AC-3' });
      controls.add({ id: 'AU-6' });
      inheritance.add('AC-2', 'Cloud Platform', 'inherited');
      inheritance.add('AC-3', 'Cloud Platform', 'customer');
      inheritance.add('AC-3', 'Cloud Platform', 'shared');

      const coverage = await resolver.summarize('Cloud Platform');

      expect(coverage).toEqual({
        provider: 'Cloud Platform',
        totalControls: 3,
        mappedControls: 2,
        coveragePercentage: 66.7,
        inherited: 1,
        shared: 1,
        customer: 0,
      });
    });

    it('should report zero coverage for an empty catalog', async () => {
      const coverage = await resolver.summarize('Cloud Platform');
      expect(coverage.coveragePercentage).toBe(0);
      expect(coverage.mappedControls).toBe(0);
    });
  });
});
