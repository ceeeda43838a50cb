const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * 履修日時をローカル時刻の `YYYY-MM-DD HH:MM:SS` 形式にする
 */
export const formatEnrollDate = (date: Date): string => {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
};

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
