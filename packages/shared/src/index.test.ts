import { INDEX_COLUMNS, name, PipelineConfigSchema } from './index';

describe('shared package', () => {
  it('exports name', () => {
    expect(name).toBe('@codecorpus/shared');
  });

  it('exposes the canonical columns and config schema', () => {
    expect(INDEX_COLUMNS).toContain('shard_id');
    expect(PipelineConfigSchema.parse({}).configVersion).toBe(1);
  });
});
