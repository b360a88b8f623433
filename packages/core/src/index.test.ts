import { ConfigLoader, formatShardId, MetadataExtractor, runPipeline } from './index';

describe('core package', () => {
  it('exposes the pipeline stages', () => {
    expect(typeof ConfigLoader.load).toBe('function');
    expect(typeof MetadataExtractor).toBe('function');
    expect(typeof runPipeline).toBe('function');
    expect(formatShardId(7)).toBe('00007');
  });
});
