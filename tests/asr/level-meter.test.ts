import { createLevelMeter, levelFromRms } from '../../src/asr/level-meter';

describe('level meter', () => {
  test('levelFromRms scales and clamps', () => {
    expect(levelFromRms(0.1)).toBe(0.5);
    expect(levelFromRms(0.5)).toBe(1);
    expect(levelFromRms(-1)).toBe(0);
    expect(levelFromRms(Number.NaN)).toBe(0);
  });

  test('ring keeps the newest samples, oldest first', () => {
    const meter = createLevelMeter({ capacity: 3, window: 2, threshold: 0.1 });
    meter.push(0.1);
    meter.push(0.2);
    meter.push(0);
    meter.push(0.1);
    expect(meter.levels()).toEqual([1, 0, 0.5]);
    expect(meter.isSpeaking()).toBe(true);
  });

  test('quiet input is not speech', () => {
    const meter = createLevelMeter({ capacity: 4, window: 2, threshold: 0.1 });
    expect(meter.isSpeaking()).toBe(false);
    meter.push(0.2);
    meter.push(0);
    meter.push(0);
    expect(meter.isSpeaking()).toBe(false);
    meter.clear();
    expect(meter.levels()).toEqual([]);
  });
});
