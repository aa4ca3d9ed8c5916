function pad(value: number): string {
  return String(value).padStart(2, "0");
}

// Local time, e.g. 2026-10-19_14-03-27
export function sessionStamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function epochSeconds(date: Date = new Date()): number {
  return date.getTime() / 1000;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
