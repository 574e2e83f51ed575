/**
 * Configuration and Runtime Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { configuredTags, loadConfig } from '../config.js';
import { TaggerError, TaggerErrorCode, describeFailure, normalizeError } from '../errors.js';
import { decodeS3Key } from '../utils.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      defaultRegion: 'us-east-1',
      extraTags: {},
      logLevel: 'info',
      triggerMode: 'auto',
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      AWS_REGION: 'eu-central-1',
      ENVIRONMENT: 'staging',
      EXTRA_TAGS: '{"Team":"platform","CostCenter":"42"}',
      LOG_LEVEL: 'debug',
      TRIGGER_MODE: 's3',
    });

    expect(config).toEqual({
      defaultRegion: 'eu-central-1',
      environment: 'staging',
      extraTags: { Team: 'platform', CostCenter: '42' },
      logLevel: 'debug',
      triggerMode: 's3',
    });
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ AWS_REGION: '', ENVIRONMENT: '', EXTRA_TAGS: '' })).toEqual({
      defaultRegion: 'us-east-1',
      extraTags: {},
      logLevel: 'info',
      triggerMode: 'auto',
    });
  });

  it('should reject EXTRA_TAGS that is not JSON', () => {
    expect(() => loadConfig({ EXTRA_TAGS: '{Team: platform}' })).toThrow('EXTRA_TAGS is not valid JSON');
  });

  it('should reject EXTRA_TAGS with non-string values', () => {
    try {
      loadConfig({ EXTRA_TAGS: '{"Count":3}' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(TaggerError);
      expect(error).toMatchObject({ code: TaggerErrorCode.CONFIG_ERROR, message: 'Invalid tagger configuration' });
    }
  });

  it('should reject an unknown trigger mode', () => {
    expect(() => loadConfig({ TRIGGER_MODE: 'sqs' })).toThrow('Invalid tagger configuration');
  });
});

describe('configuredTags', () => {
  it('should put Environment before the extra tags', () => {
    const tags = configuredTags(loadConfig({ ENVIRONMENT: 'prod', EXTRA_TAGS: '{"Team":"platform"}' }));

    expect(tags).toEqual({ Environment: 'prod', Team: 'platform' });
    expect(Object.keys(tags)).toEqual(['Environment', 'Team']);
  });

  it('should omit Environment when unset', () => {
    expect(configuredTags(loadConfig({}))).toEqual({});
  });
});

describe('decodeS3Key', () => {
  it('should decode form-encoded object keys', () => {
    expect(decodeS3Key('AWSLogs/111122223333/CloudTrail/us-west-2/2024/05/01/file%3A1.json.gz'))
      .toBe('AWSLogs/111122223333/CloudTrail/us-west-2/2024/05/01/file:1.json.gz');
    expect(decodeS3Key('my+logs/a%2Bb.json.gz')).toBe('my logs/a+b.json.gz');
  });
});

describe('errors', () => {
  it('should describe SDK-style errors by name and message', () => {
    const error = new Error('Rate exceeded');
    error.name = 'ThrottlingException';

    expect(describeFailure(error)).toEqual({ code: 'ThrottlingException', message: 'Rate exceeded' });
  });

  it('should describe values that are not errors', () => {
    expect(describeFailure('boom')).toEqual({ code: 'UnknownError', message: 'boom' });
    expect(describeFailure(undefined)).toEqual({ code: 'UnknownError', message: undefined });
  });

  it('should normalize thrown values to TaggerError', () => {
    const original = new TaggerError('bad', TaggerErrorCode.CONFIG_ERROR);

    expect(normalizeError(original)).toBe(original);
    expect(normalizeError(new RangeError('out of range'))).toMatchObject({
      message: 'out of range',
      code: TaggerErrorCode.INTERNAL_ERROR,
      details: { originalError: 'RangeError' },
    });
    expect(normalizeError(7).message).toBe('Unknown error occurred');
  });
});
