import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors/index.js';
import { cssColorVariables, parseHexColor } from './color.js';

describe('parseHexColor', () => {
  it('normalises #RRGGBB to integer components', () => {
    expect(parseHexColor('#6B46C1')).toEqual([107, 70, 193]);
  });

  it('accepts lowercase and shorthand forms', () => {
    expect(parseHexColor('#ffffff')).toEqual([255, 255, 255]);
    expect(parseHexColor('#0f8')).toEqual([0, 255, 136]);
  });

  it.each(['6B46C1', '#6B46C', '#GGGGGG', 'purple', ''])('rejects %j', (value) => {
    expect(() => parseHexColor(value, 'primaryColor')).toThrow(ValidationError);
  });

  it('names the field in the issue', () => {
    try {
      parseHexColor('red', 'accentColor');
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual(['accentColor: must be a #RRGGBB hex colour']);
      }
    }
  });
});

describe('cssColorVariables', () => {
  it('emits one variable per component', () => {
    expect(cssColorVariables('primary', [107, 70, 193])).toBe(
      '--primary-r: 107; --primary-g: 70; --primary-b: 193;',
    );
  });
});
