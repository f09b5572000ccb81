import { config } from './config';

let testNow: Date | null = null;

export function setTestNow(date: Date | null): void {
  if (config.isTest) {
    testNow = date;
  }
}

export function getNow(): Date {
  if (config.isTest && testNow) {
    return testNow;
  }
  return new Date();
}

// Seconds since epoch, the unit JWT `exp` claims use
export function getNowSeconds(): number {
  return Math.floor(getNow().getTime() / 1000);
}
