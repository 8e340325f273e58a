import { describe, expect, it } from 'vitest';
import { Settings } from '../settings.js';
import { renderSettings } from './printer.js';

describe('renderSettings', () => {
  it('renders the store as sorted pretty JSON', () => {
    const settings = new Settings();
    settings.set('port', 80);
    settings.set('environment', 'staging');
    expect(renderSettings(settings)).toBe('{\n  "environment": "staging",\n  "port": "80"\n}');
  });
});
