export const mask = (s: string, keep = 6) => (s && s.length > keep * 2 ? s.slice(0, keep) + '…' + s.slice(-keep) : s);
export const maskAddr = (s: string) => mask(s.toLowerCase(), 6);
