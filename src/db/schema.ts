export * from "./schema/tournaments.js";
export * from "./schema/tournamentParticipants.js";
export * from "./schema/matches.js";
export * from "./schema/tournamentRankings.js";
export * from "./schema/qualifierSnapshots.js";
export * from "./schema/rewardConfigs.js";
export * from "./schema/rewardLedger.js";
export * from "./schema/tournamentStatusHistory.js";
