/**
 * Unit tests for the frame encoder
 */

import { DEFAULT_PULSE_TIMING, encodeDht22Frame, frameToEdges, timingForThreshold } from './frame-encoder';

describe('encodeDht22Frame', () => {
  it('should encode humidity and temperature in tenths with a checksum', () => {
    expect(encodeDht22Frame({ humidity: 50, temperature: 26 })).toEqual([0x01, 0xf4, 0x01, 0x04, 0xfa]);
  });

  it('should set the sign bit for negative temperatures', () => {
    expect(encodeDht22Frame({ humidity: 65.2, temperature: -10.1 })).toEqual([0x02, 0x8c, 0x80, 0x65, 0x73]);
  });
});

describe('frameToEdges', () => {
  const edges = frameToEdges([0x01, 0xf4, 0x01, 0x04, 0xfa], 1000);

  it('should emit release, response and two edges per bit', () => {
    expect(edges).toHaveLength(85);
  });

  it('should start with the host release and the response pulses', () => {
    expect(edges.slice(0, 4)).toEqual([
      { level: 1, timestampUs: 1000 },
      { level: 0, timestampUs: 1030 },
      { level: 1, timestampUs: 1110 },
      { level: 0, timestampUs: 1190 }
    ]);
  });

  it('should encode 0 and 1 bits as short and long high pulses', () => {
    // 0x01: seven 0 bits then a 1 bit
    expect(edges[5].timestampUs - edges[4].timestampUs).toBe(DEFAULT_PULSE_TIMING.zeroHighUs);
    expect(edges[19].timestampUs - edges[18].timestampUs).toBe(DEFAULT_PULSE_TIMING.oneHighUs);
  });

  it('should end with the sensor releasing the line', () => {
    expect(edges[84].level).toBe(1);
  });
});

describe('timingForThreshold', () => {
  it('should place bit widths either side of the threshold', () => {
    const timing = timingForThreshold(50, 150);

    expect(timing.zeroHighUs).toBe(25);
    expect(timing.oneHighUs).toBe(70);
  });

  it('should not exceed the bit maximum', () => {
    expect(timingForThreshold(150, 150).oneHighUs).toBe(150);
  });
});
