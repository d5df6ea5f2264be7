import {
  BackupData,
  CharacteristicWrite,
  createBackup,
  parseBackup,
  planRestore,
  snapshotFromBackup,
} from "./backup";
import { IGattConnection, IGattTransport } from "./bluetooth";
import NobleBluetoothTransport from "./bluetooth-noble";
import * as characteristics from "./characteristics";
import {
  dateTimeFromDate,
  dateTimeToDate,
  decodeDateTime,
  encodeDateTime,
  formatDateTime,
  parseDateTime,
} from "./codecs/datetime";
import {
  decodeDaySchedule,
  encodeDaySchedule,
  formatTimeOfDay,
  parseTimeOfDay,
} from "./codecs/day-schedule";
import { clearedHoliday, decodeHoliday, encodeHoliday, isHolidayCleared } from "./codecs/holiday";
import { encodePin } from "./codecs/pin";
import {
  decodeBattery,
  decodeFlags,
  decodeLcdTimer,
  decodeString,
  encodeFlags,
  encodeLcdTimer,
} from "./codecs/scalars";
import { TEMPERATURE_UNSET, decodeTemperature, encodeTemperature } from "./codecs/temperature";
import { decodeTemperatures, encodeTemperatures } from "./codecs/temperatures";
import CometBlue, { CometBlueOptions } from "./comet-blue";
import { DiscoveredDevice, discover } from "./discovery";
import {
  DeviceError,
  EncodingRangeError,
  InvalidPinError,
  MalformedDataError,
  TooManyPeriodsError,
} from "./errors";
import Logger from "./logger";
import Temperature from "./temperature";
import { DateTime, DaySchedule, DeviceSnapshot, Holiday, Period, Temperatures } from "./types";
import { WEEKDAYS, Weekday, parseWeekday } from "./weekdays";

export type {
  BackupData,
  CharacteristicWrite,
  CometBlueOptions,
  DateTime,
  DaySchedule,
  DeviceSnapshot,
  DiscoveredDevice,
  Holiday,
  IGattConnection,
  IGattTransport,
  Period,
  Temperatures,
  Weekday,
};

export {
  characteristics,
  clearedHoliday,
  CometBlue,
  createBackup,
  dateTimeFromDate,
  dateTimeToDate,
  decodeBattery,
  decodeDateTime,
  decodeDaySchedule,
  decodeFlags,
  decodeHoliday,
  decodeLcdTimer,
  decodeString,
  decodeTemperature,
  decodeTemperatures,
  DeviceError,
  discover,
  encodeDateTime,
  encodeDaySchedule,
  encodeFlags,
  encodeHoliday,
  encodeLcdTimer,
  encodePin,
  encodeTemperature,
  encodeTemperatures,
  EncodingRangeError,
  formatDateTime,
  formatTimeOfDay,
  InvalidPinError,
  isHolidayCleared,
  Logger,
  MalformedDataError,
  NobleBluetoothTransport,
  parseBackup,
  parseDateTime,
  parseTimeOfDay,
  parseWeekday,
  planRestore,
  snapshotFromBackup,
  Temperature,
  TEMPERATURE_UNSET,
  TooManyPeriodsError,
  WEEKDAYS,
};
