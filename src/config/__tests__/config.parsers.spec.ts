import {
  parseCommand,
  parseHourList,
  parseNumberWithDefault,
  parseOptionalBoolean,
  parseStringWithDefault,
} from '../config.parsers';

describe('parseOptionalBoolean', () => {
  it('should return the default when the value is undefined', () => {
    expect(parseOptionalBoolean(undefined)).toBe(false);
    expect(parseOptionalBoolean(undefined, true)).toBe(true);
  });

  it.each(['true', '1', 'yes', 'on', ' TRUE '])('should parse "%s" as true', (value) => {
    expect(parseOptionalBoolean(value)).toBe(true);
  });

  it.each(['false', '0', 'FALSE'])('should parse "%s" as false', (value) => {
    expect(parseOptionalBoolean(value, true)).toBe(false);
  });

  it('should fall back to the default for unrecognized values', () => {
    expect(parseOptionalBoolean('maybe', true)).toBe(true);
  });
});

describe('parseNumberWithDefault', () => {
  it('should return the default for undefined or empty values', () => {
    expect(parseNumberWithDefault(undefined, 8080)).toBe(8080);
    expect(parseNumberWithDefault('', 8080)).toBe(8080);
  });

  it('should parse integers', () => {
    expect(parseNumberWithDefault('300000', 0)).toBe(300000);
  });

  it('should reject negative, fractional and non-numeric values', () => {
    expect(() => parseNumberWithDefault('-1', 0)).toThrow('must be a non-negative finite number');
    expect(() => parseNumberWithDefault('1.5', 0)).toThrow('must be an integer');
    expect(() => parseNumberWithDefault('abc', 0)).toThrow('Invalid numeric value: "abc"');
  });
});

describe('parseStringWithDefault', () => {
  it('should return the value when present', () => {
    expect(parseStringWithDefault('certbot-auto', 'certbot')).toBe('certbot-auto');
  });

  it('should return the default for undefined or empty values', () => {
    expect(parseStringWithDefault(undefined, 'certbot')).toBe('certbot');
    expect(parseStringWithDefault('', 'certbot')).toBe('certbot');
  });
});

describe('parseCommand', () => {
  it('should split a command line on whitespace', () => {
    expect(parseCommand('  apt-get   install -y\tcertbot ')).toEqual(['apt-get', 'install', '-y', 'certbot']);
  });

  it('should use the default when the value is undefined', () => {
    expect(parseCommand(undefined, 'ufw status')).toEqual(['ufw', 'status']);
    expect(parseCommand(undefined)).toEqual([]);
  });

  it('should return an empty argv for an explicitly empty value', () => {
    expect(parseCommand('', 'apt-get install -y certbot')).toEqual([]);
  });
});

describe('parseHourList', () => {
  it('should return a copy of the defaults when unset', () => {
    const defaults = [6, 18];
    const hours = parseHourList(undefined, defaults);

    expect(hours).toEqual([6, 18]);
    expect(hours).not.toBe(defaults);
    expect(parseHourList('  ', defaults)).toEqual([6, 18]);
  });

  it('should sort and deduplicate hours', () => {
    expect(parseHourList('18, 6,6,0', [])).toEqual([0, 6, 18]);
  });

  it('should reject hours outside 0-23', () => {
    expect(() => parseHourList('6,24', [])).toThrow('Invalid hour list: "6,24"');
    expect(() => parseHourList('-1', [])).toThrow('Invalid hour list');
    expect(() => parseHourList('six', [])).toThrow('Invalid hour list');
  });

  it('should reject a list with only separators', () => {
    expect(() => parseHourList(',,', [])).toThrow('Invalid hour list: ",,"');
  });
});
