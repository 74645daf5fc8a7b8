/** `1` or `true`, any case, turns debug lines on. */
export const isDebugFlag = (raw: string | undefined) => {
  const flag = (raw ?? '').trim().toLowerCase();
  return flag === '1' || flag === 'true';
};

let enabled = isDebugFlag(process.env.CAFE_DEBUG);

/** The CLI calls this with the CAFE_DEBUG of the environment it was given. */
export const setDebug = (on: boolean) => {
  enabled = on;
};

export const debugEnabled = () => enabled;

// stdout carries command output, so diagnostics go to stderr
export const dbg = (feature: string, msg: string, data?: unknown) => {
  if (!enabled) return;
  if (data === undefined) console.error(`[${feature}] ${msg}`);
  else console.error(`[${feature}] ${msg}`, data);
};

export const warn = (feature: string, msg: string, data?: unknown) => {
  if (data === undefined) console.error(`[${feature}] ${msg}`);
  else console.error(`[${feature}] ${msg}`, data);
};
