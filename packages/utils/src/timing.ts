export function elapsedMilliseconds(startTime: Date | number): number {
  return Date.now() - new Date(startTime).getTime();
}
