import { decodeStatusMessage, encodeStatusMessage, isStatusBroadcast } from './status-broadcast.codec';
import { DecodeError, EncodeError } from '../errors/engine-errors';

const NODE = '!0000beef';

describe('status broadcast codec', () => {
  it('encodes the documented wire format', () => {
    expect(
      encodeStatusMessage({
        color: 'YELLOW',
        reasons: ['Battery', 'Voltage'],
        helpRequested: true,
        version: '1.3.0',
        timestamp: 1_700_000_000,
      }),
    ).toBe('[ICP-STATUS]YELLOW|Battery,Voltage|YES|1.3.0|1700000000');
  });

  it('keeps an empty reasons segment through a round trip', () => {
    const text = encodeStatusMessage({
      color: 'GREEN',
      reasons: [],
      helpRequested: false,
      version: '1.3.0',
      timestamp: 42,
    });

    expect(text).toBe('[ICP-STATUS]GREEN||NO|1.3.0|42');
    expect(decodeStatusMessage(NODE, text)).toEqual({
      nodeId: NODE,
      color: 'GREEN',
      reasons: [],
      helpRequested: false,
      version: '1.3.0',
      timestamp: 42,
    });
  });

  it('decodes reasons in order', () => {
    expect(decodeStatusMessage(NODE, '[ICP-STATUS]RED|Battery,Temperature|NO|2.0|1').reasons).toEqual([
      'Battery',
      'Temperature',
    ]);
  });

  it('ignores trailing whitespace after the timestamp', () => {
    expect(decodeStatusMessage(NODE, '[ICP-STATUS]GREEN||NO|1.3.0|7\n').timestamp).toBe(7);
  });

  it.each([
    ['too few segments', '[ICP-STATUS]GREEN||NO|1.3.0'],
    ['too many segments', '[ICP-STATUS]GREEN||NO|1.3.0|1|extra'],
    ['unknown color', '[ICP-STATUS]BLUE||NO|1.3.0|1'],
    ['lowercase color', '[ICP-STATUS]green||NO|1.3.0|1'],
    ['empty reason entry', '[ICP-STATUS]RED|Battery,,Voltage|NO|1.3.0|1'],
    ['bad help flag', '[ICP-STATUS]RED|Battery|MAYBE|1.3.0|1'],
    ['missing version', '[ICP-STATUS]RED|Battery|NO||1'],
    ['negative timestamp', '[ICP-STATUS]RED|Battery|NO|1.3.0|-5'],
    ['fractional timestamp', '[ICP-STATUS]RED|Battery|NO|1.3.0|1.5'],
    ['no prefix', 'GREEN||NO|1.3.0|1'],
  ])('rejects %s', (_label, text) => {
    expect(() => decodeStatusMessage(NODE, text)).toThrow(DecodeError);
  });

  it('refuses to encode reasons or versions the decoder would reject', () => {
    const message = { color: 'RED' as const, helpRequested: false, version: '1.3.0', timestamp: 1 };

    expect(() => encodeStatusMessage({ ...message, reasons: ['Bat,tery'] })).toThrow(EncodeError);
    expect(() => encodeStatusMessage({ ...message, reasons: ['Bat|tery'] })).toThrow(EncodeError);
    expect(() => encodeStatusMessage({ ...message, reasons: [''] })).toThrow(EncodeError);
    expect(() => encodeStatusMessage({ ...message, reasons: [' '] })).toThrow(EncodeError);
    expect(() => encodeStatusMessage({ ...message, version: '  ' })).toThrow(EncodeError);
  });

  it('recognises the prefix only at the start of the text', () => {
    expect(isStatusBroadcast('[ICP-STATUS]GREEN||NO|1|1')).toBe(true);
    expect(isStatusBroadcast('hello [ICP-STATUS]')).toBe(false);
  });
});
