import { describe, expect, it } from 'vitest';
import { fromHex } from '../encoding/bytes';
import { HeaterForced, HeaterMode, HeatPumpMode, Mode, SolarMessage, SpeedLevel, TemperatureValidity } from './enums';
import {
  HeaterCapabilities,
  HeaterConfig,
  HeaterCooldownState,
  HeaterState,
  SolarCapabilities,
  SolarConfig,
  SolarState,
} from './halo-heating';

describe('heater records', () => {
  it('should decode capabilities', () => {
    expect(HeaterCapabilities.fromBytes(fromHex('0100010103'))).toEqual({
      heaterEnabled: true,
      filterPumpThreeSpeed: false,
      heaterPumpThreeSpeed: true,
      heaterPumpInstalled: true,
      heaterPumpTimerBit: 3,
    });
  });

  it('should map an unset minimum pump speed to NOT_SET', () => {
    expect(HeaterConfig.fromBytes(fromHex('01ff'))).toEqual({
      heaterPumpEnabled: true,
      heaterMinPumpSpeed: SpeedLevel.NOT_SET,
    });
  });

  it('should decode heater state and status flags', () => {
    const state = HeaterState.fromBytes(fromHex('0901011c010000000104' + '0100'));
    expect(state).toMatchObject({
      heaterStatusFlags: 0x09,
      heaterPumpMode: Mode.AUTO,
      heaterMode: HeaterMode.ON,
      heaterSetpoint: 28,
      heatPumpMode: HeatPumpMode.HEATING,
      heaterForced: HeaterForced.NOT_FORCED,
      heaterWaterTemperatureValid: TemperatureValidity.IS_VALID,
      heaterWaterTemperature: 26,
      heaterError: 0,
      heaterOn: true,
      heaterFlame: true,
      heaterGasValve: false,
      heaterLockout: false,
    });
  });

  it('should decode cooldown progress', () => {
    expect(HeaterCooldownState.fromBytes(fromHex('010200012c015802'))).toEqual({
      heaterCooldownEventOccurred: true,
      heaterCooldownState: 2,
      heaterCooldownTargetMode: 1,
      remainingCooldownTime: 300,
      totalHeaterCooldownTime: 600,
    });
  });
});

describe('solar records', () => {
  it('should decode capabilities', () => {
    expect(SolarCapabilities.fromBytes(fromHex('01'))).toEqual({ solarEnabled: true });
  });

  it('should convert pump times to minutes after midnight', () => {
    expect(SolarConfig.fromBytes(fromHex('081e1100010c00050001'))).toEqual({
      solarPumpStartMinutes: 510,
      solarPumpStopMinutes: 1020,
      solarEnableFlush: true,
      solarFlushTimeMinutes: 720,
      solarDifferential: 5,
      solarEnableExclusionPeriod: true,
    });
  });

  it('should decode solar state', () => {
    expect(SolarState.fromBytes(fromHex('9001e60000000101030101000002'))).toEqual({
      solarRoofTemperature: 40,
      solarWaterTemperature: 23,
      solarTemperature: 0,
      solarIsSummerMode: true,
      solarMode: Mode.AUTO,
      solarFlags: 3,
      solarPumpState: true,
      solarFlushActive: true,
      solarRoofTemperatureValid: TemperatureValidity.IS_VALID,
      solarWaterTemperatureValid: TemperatureValidity.IS_VALID,
      solarSpecTemperature: 0,
      solarMessage: SolarMessage.SOLAR_HEATING_ACTIVE,
    });
  });
});
