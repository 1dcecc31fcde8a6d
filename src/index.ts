import { games, GameFactory, GameBase, GridfightGame, ActionCatalog, getActionCatalog } from "./games";
import type { IGameInformation, GridfightSnapshot, IDogfightContext, IDogfightResult, playerid, MoveResult, HistoryEntry } from "./games";
import { AIFactory, AIBase, RandomAI, HeuristicAI, RolloutAI, supportedAgents, sampleHiddenInformation } from "./ais";
import type { RolloutOptions } from "./ais";
import { playGame, playMatch, playBalancedMatch, matchRates, formatMatch, playTournament, rankAgents, recordWinRate, formatTournament, createReplay, replayToJSON, replayFromJSON, replayGame } from "./harness";
import type { IGameResult, IMatchResult, ITournamentRecord, ITournamentResult, Replay, ReplayMetadata } from "./harness";
import { addResource, supportedLocales, UserFacingError, ProtocolError, SimulationError, ReplayError, logger, loadConfig } from "./common";

export type {
    IGameInformation, GridfightSnapshot, IDogfightContext, IDogfightResult, playerid, MoveResult, HistoryEntry,
    RolloutOptions, IGameResult, IMatchResult, ITournamentRecord, ITournamentResult, Replay, ReplayMetadata,
};
export {
    GameFactory, GameBase, GridfightGame, ActionCatalog, getActionCatalog, AIFactory, AIBase, RandomAI, HeuristicAI,
    RolloutAI, supportedAgents, sampleHiddenInformation, playGame, playMatch, playBalancedMatch, matchRates, formatMatch,
    playTournament, rankAgents, recordWinRate, formatTournament,
    createReplay, replayToJSON, replayFromJSON, replayGame, addResource, supportedLocales, UserFacingError, ProtocolError,
    SimulationError, ReplayError, logger, loadConfig,
};

const gameinfo: Map<string, IGameInformation> = new Map();
games.forEach((v, k) => {
    gameinfo.set(k, v.gameinfo);
});
export { gameinfo };
