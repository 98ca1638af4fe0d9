import { describe, it, expect } from 'vitest';
import { ValidationError } from '@model-bootstrap/utils';
import { parseBootstrapArgs } from '../../src/commands/bootstrap.js';

describe('bootstrap options', () => {
  it('defaults every flag to false', () => {
    expect(parseBootstrapArgs({})).toEqual({
      list: false,
      inventory: false,
      allowPartial: false,
    });
  });

  it('keeps the selected groups', () => {
    expect(parseBootstrapArgs({ only: ['sd15', 'sdxl'], allowPartial: true })).toEqual({
      only: ['sd15', 'sdxl'],
      list: false,
      inventory: false,
      allowPartial: true,
    });
  });

  it('rejects --list with --inventory', () => {
    expect(() => parseBootstrapArgs({ list: true, inventory: true })).toThrow(ValidationError);
    expect(() => parseBootstrapArgs({ list: true, inventory: true })).toThrow(
      'Invalid options: inventory: --list and --inventory cannot be combined'
    );
  });

  it('rejects an empty ComfyUI dir', () => {
    expect(() => parseBootstrapArgs({ comfyuiDir: '' })).toThrow(/comfyuiDir/);
  });
});
