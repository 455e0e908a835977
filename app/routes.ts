import type { HTTPMethods } from "fastify";
import * as categories from "./api/categories/route";
import * as chatMessages from "./api/chats/[id]/messages/route";
import * as chatsMatch from "./api/chats/match/route";
import * as chats from "./api/chats/route";
import * as cronEventReminders from "./api/cron/event-reminders/route";
import * as eventJoin from "./api/events/[id]/join/route";
import * as eventLeave from "./api/events/[id]/leave/route";
import * as events from "./api/events/route";
import * as eventSuggestions from "./api/events/suggestions/route";
import * as upcomingEvents from "./api/events/upcoming/route";
import * as health from "./api/health/route";
import * as notificationRead from "./api/notifications/[id]/read/route";
import * as notificationPreferences from "./api/notifications/preferences/route";
import * as notifications from "./api/notifications/route";
import * as stats from "./api/stats/route";
import * as skillLevels from "./api/users/levels/route";
import * as usersMe from "./api/users/me/route";
import * as userSuggestions from "./api/users/suggestions/route";
import type { RouteHandler } from "./lib/http";

export type ApiRoute = {
  method: HTTPMethods;
  url: string;
  handler: RouteHandler;
};

/** Static paths are listed before parameterised siblings. */
export const API_ROUTES: readonly ApiRoute[] = [
  { method: "GET", url: "/health", handler: health.GET },
  { method: "GET", url: "/api/health", handler: health.GET },
  { method: "GET", url: "/api/events", handler: events.GET },
  { method: "POST", url: "/api/events", handler: events.POST },
  { method: "GET", url: "/api/events/upcoming", handler: upcomingEvents.GET },
  { method: "GET", url: "/api/events/suggestions", handler: eventSuggestions.GET },
  { method: "POST", url: "/api/events/:id/join", handler: eventJoin.POST },
  { method: "POST", url: "/api/events/:id/leave", handler: eventLeave.POST },
  { method: "GET", url: "/api/users/suggestions", handler: userSuggestions.GET },
  { method: "GET", url: "/api/users/me", handler: usersMe.GET },
  { method: "PUT", url: "/api/users/me", handler: usersMe.PUT },
  { method: "GET", url: "/api/users/levels", handler: skillLevels.GET },
  { method: "GET", url: "/api/chats", handler: chats.GET },
  { method: "POST", url: "/api/chats/match", handler: chatsMatch.POST },
  { method: "GET", url: "/api/chats/:id/messages", handler: chatMessages.GET },
  { method: "POST", url: "/api/chats/:id/messages", handler: chatMessages.POST },
  { method: "GET", url: "/api/categories", handler: categories.GET },
  { method: "GET", url: "/api/stats", handler: stats.GET },
  { method: "GET", url: "/api/notifications", handler: notifications.GET },
  { method: "GET", url: "/api/notifications/preferences", handler: notificationPreferences.GET },
  { method: "PUT", url: "/api/notifications/preferences", handler: notificationPreferences.PUT },
  { method: "POST", url: "/api/notifications/:id/read", handler: notificationRead.POST },
  { method: "POST", url: "/api/cron/event-reminders", handler: cronEventReminders.POST },
];
