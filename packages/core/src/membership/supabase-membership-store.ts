import {
  deleteChatMember,
  deleteParticipation,
  findChatIdByEventId,
  findDirectChatId,
  insertDirectChat,
  insertEventChat,
  loadEventById,
  upsertChatMembers,
  upsertParticipation,
} from "../../../db/src/queries";
import type { DbClient } from "../../../db/src/types";
import type { MembershipStore, MembershipStores } from "./membership-reconciler";

export function createSupabaseMembershipStore(db: DbClient): MembershipStore {
  return {
    findEvent: (eventId) => loadEventById(db, eventId),
    findChatIdByEventId: (eventId) => findChatIdByEventId(db, eventId),
    insertEventChat: (input) => insertEventChat(db, input),
    upsertParticipation: (input) => upsertParticipation(db, input),
    upsertMemberships: (members) => upsertChatMembers(db, members),
    deleteMembership: (chatId, userId) => deleteChatMember(db, chatId, userId),
    deleteParticipation: (eventId, userId) => deleteParticipation(db, eventId, userId),
    findDirectChatId: (userId, peerId) => findDirectChatId(db, userId, peerId),
    insertDirectChat: (createdBy) => insertDirectChat(db, createdBy),
  };
}

/** Pair a caller-scoped client with the service-role client. */
export function createSupabaseMembershipStores(clients: {
  scoped: DbClient;
  elevated: DbClient;
}): MembershipStores {
  return {
    scoped: createSupabaseMembershipStore(clients.scoped),
    elevated: createSupabaseMembershipStore(clients.elevated),
  };
}
