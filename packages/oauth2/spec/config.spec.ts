import { describe, expect, it } from 'vitest';

import { readEnvironmentConfig } from '#config';

describe('fn:readEnvironmentConfig', () => {
  it('should default to the probe enabled and no host override', () => {
    expect(readEnvironmentConfig({})).toEqual({
      metadataHost: undefined,
      skipComputeEngineCheck: false,
    });
  });

  it('should read the metadata host and the probe switch', () => {
    expect(
      readEnvironmentConfig({
        GCE_METADATA_HOST: ' metadata.test:8080 ',
        NO_GCE_CHECK: 'TRUE',
      }),
    ).toEqual({
      metadataHost: 'metadata.test:8080',
      skipComputeEngineCheck: true,
    });
  });

  it('should ignore blank values', () => {
    expect(
      readEnvironmentConfig({ GCE_METADATA_HOST: '  ', NO_GCE_CHECK: 'no' }),
    ).toEqual({ metadataHost: undefined, skipComputeEngineCheck: false });
  });
});
