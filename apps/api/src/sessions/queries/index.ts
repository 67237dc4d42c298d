import { GetSessionHandler } from "./get-session.handler";

export { GetSessionHandler } from "./get-session.handler";
export { GetSessionQuery } from "./get-session.query";

export const sessionQueryHandlers = [GetSessionHandler] as const;
