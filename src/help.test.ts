import { help } from './help';

describe('help', () => {
  it('should be an array of strings', () => {
    expect(Array.isArray(help)).toBe(true);
    help.forEach(item => {
      expect(typeof item).toBe('string');
    });
  });

  it('should contain multiple help sections', () => {
    expect(help.length).toBeGreaterThan(1);
  });

  it('should document every command', () => {
    const allHelp = help.join('');
    expect(allHelp).toContain('`help`');
    expect(allHelp).toContain('`render`');
    expect(allHelp).toContain('`check`');
    expect(allHelp).toContain('`translate <input> [--out FILE]`');
    expect(allHelp).toContain('`config KEY VALUE`');
  });

  it('should document the override flags', () => {
    const allHelp = help.join('');
    expect(allHelp).toContain('--source');
    expect(allHelp).toContain('--target');
    expect(allHelp).toContain('--provider');
    expect(allHelp).toContain('--model');
    expect(allHelp).toContain('--template');
    expect(allHelp).toContain('--batch');
  });

  it('should document the environment variables', () => {
    const allHelp = help.join('');
    expect(allHelp).toContain('ANTHROPIC_API_KEY');
    expect(allHelp).toContain('OPENAI_API_KEY');
    expect(allHelp).toContain('OTLP_TRACES_URL');
  });
});
