export const CONNECTION_PROVIDER = Symbol('CONNECTION_PROVIDER');
export const CHAT_POSTER = Symbol('CHAT_POSTER');
