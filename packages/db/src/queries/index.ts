export * from "./categories";
export * from "./chats";
export * from "./events";
export * from "./messages";
export * from "./notifications";
export * from "./participants";
export * from "./profiles";
export * from "./stats";
