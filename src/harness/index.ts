import type { HistoryEntry, playerid } from "../games";
import { GridfightGame } from "../games";
import { AIBase } from "../ais";
import { scopedLogger } from "../common";

const log = scopedLogger("harness");

export interface IGameResult {
    winner: playerid | "draw";
    // placement turns played
    turns: number;
    seed: number;
    playerOneAgent: string;
    playerTwoAgent: string;
    history: HistoryEntry[];
}

export interface IMatchResult {
    playerOneAgent: string;
    playerTwoAgent: string;
    numGames: number;
    playerOneWins: number;
    playerTwoWins: number;
    draws: number;
    gameResults: IGameResult[];
}

const choose = (agent: AIBase, engine: GridfightGame, legal: number[], player: playerid): number => {
    const choice = agent.selectAction(engine.state(), legal, player);
    if (!legal.includes(choice)) {
        throw new Error(`Agent ${agent.name} (player ${player}) chose action ${choice}, which was not offered.`);
    }
    return choice;
}

/**
 * Plays one game to the end. Every decision gets a fresh snapshot, so agents
 * see revealed units as soon as a dogfight begins.
 */
export const playGame = (agentOne: AIBase, agentTwo: AIBase, seed?: number): IGameResult => {
    const engine = new GridfightGame(seed);
    const seat = (player: playerid): AIBase => player === 1 ? agentOne : agentTwo;
    agentOne.onGameStart(1, engine.seed);
    agentTwo.onGameStart(2, engine.seed);

    while (!engine.isGameOver()) {
        if (engine.phase === "placement") {
            const player = engine.currplayer;
            engine.applyAction(choose(seat(player), engine, engine.getLegalActions(), player));
        } else {
            engine.beginDogfight();
            while (!engine.isDogfightComplete()) {
                const actor = engine.getDogfightActor();
                engine.applyDogfightTurnAction(actor, choose(seat(actor), engine, engine.getDogfightLegalActions(actor), actor));
            }
            engine.finishDogfight();
        }
    }

    const winner = engine.getWinner();
    if (winner === undefined) {
        throw new Error("The game loop exited before the game ended. This should never happen.");
    }
    const final = engine.state();
    agentOne.onGameEnd(final, winner);
    agentTwo.onGameEnd(final, winner);
    log.debug("game finished", {seed: engine.seed, winner, one: agentOne.name, two: agentTwo.name});
    return {
        winner,
        turns: engine.turn,
        seed: engine.seed,
        playerOneAgent: agentOne.name,
        playerTwoAgent: agentTwo.name,
        history: engine.history.map(([p, i]): HistoryEntry => [p, i]),
    };
}

/**
 * Plays a series with fixed seats. Seeds count up from `startSeed` when it is
 * given.
 */
export const playMatch = (agentOne: AIBase, agentTwo: AIBase, numGames: number, startSeed?: number): IMatchResult => {
    const result: IMatchResult = {
        playerOneAgent: agentOne.name,
        playerTwoAgent: agentTwo.name,
        numGames,
        playerOneWins: 0,
        playerTwoWins: 0,
        draws: 0,
        gameResults: [],
    };
    for (let i = 0; i < numGames; i++) {
        const game = playGame(agentOne, agentTwo, startSeed === undefined ? undefined : startSeed + i);
        result.gameResults.push(game);
        if (game.winner === 1) {
            result.playerOneWins++;
        } else if (game.winner === 2) {
            result.playerTwoWins++;
        } else {
            result.draws++;
        }
    }
    log.info("match finished", {summary: formatMatch(result)});
    return result;
}

/**
 * Half the games with each agent in the first seat. Counts are reported from
 * agent A's side: "player one" is A throughout.
 */
export const playBalancedMatch = (agentA: AIBase, agentB: AIBase, numGames: number, startSeed?: number): IMatchResult => {
    if (numGames % 2 !== 0) {
        throw new RangeError(`A balanced match needs an even number of games, not ${numGames}.`);
    }
    const half = numGames / 2;
    const first = playMatch(agentA, agentB, half, startSeed);
    const second = playMatch(agentB, agentA, half, startSeed === undefined ? undefined : startSeed + half);
    return {
        playerOneAgent: agentA.name,
        playerTwoAgent: agentB.name,
        numGames,
        playerOneWins: first.playerOneWins + second.playerTwoWins,
        playerTwoWins: first.playerTwoWins + second.playerOneWins,
        draws: first.draws + second.draws,
        gameResults: [...first.gameResults, ...second.gameResults],
    };
}

export const matchRates = (result: IMatchResult): {playerOne: number; playerTwo: number; draw: number} => {
    if (result.numGames === 0) {
        return {playerOne: 0, playerTwo: 0, draw: 0};
    }
    return {
        playerOne: result.playerOneWins / result.numGames,
        playerTwo: result.playerTwoWins / result.numGames,
        draw: result.draws / result.numGames,
    };
}

const pct = (n: number): string => `${(n * 100).toFixed(1)}%`;

export const formatMatch = (result: IMatchResult): string => {
    const rates = matchRates(result);
    return [
        `Match Results: ${result.playerOneAgent} vs ${result.playerTwoAgent}`,
        `Games: ${result.numGames}`,
        `P1 Wins: ${result.playerOneWins} (${pct(rates.playerOne)})`,
        `P2 Wins: ${result.playerTwoWins} (${pct(rates.playerTwo)})`,
        `Draws: ${result.draws} (${pct(rates.draw)})`,
    ].join("\n");
}

export interface ITournamentRecord {
    wins: number;
    losses: number;
    draws: number;
}

export interface ITournamentResult {
    agentNames: string[];
    gamesPerMatchup: number;
    standings: Record<string, ITournamentRecord>;
    // headToHead[row][column] is row's record against column
    headToHead: Record<string, Record<string, ITournamentRecord>>;
    matches: IMatchResult[];
}

const emptyRecord = (): ITournamentRecord => ({wins: 0, losses: 0, draws: 0});

const addRecord = (total: ITournamentRecord, rec: ITournamentRecord): void => {
    total.wins += rec.wins;
    total.losses += rec.losses;
    total.draws += rec.draws;
}

/**
 * Round robin: every pair of agents plays a balanced match of
 * `gamesPerMatchup` games. Seeds count up from `startSeed` across all
 * matchups when it is given. Agent names must be unique.
 */
export const playTournament = (agents: readonly AIBase[], gamesPerMatchup: number, startSeed?: number): ITournamentResult => {
    const agentNames = agents.map(a => a.name);
    if (new Set(agentNames).size !== agentNames.length) {
        throw new Error(`Tournament agents need unique names, got ${agentNames.join(", ")}.`);
    }
    const result: ITournamentResult = {
        agentNames,
        gamesPerMatchup,
        standings: {},
        headToHead: {},
        matches: [],
    };
    for (const name of agentNames) {
        result.standings[name] = emptyRecord();
        result.headToHead[name] = {};
    }

    let matchup = 0;
    for (let i = 0; i < agents.length; i++) {
        for (let j = i + 1; j < agents.length; j++) {
            const a = agents[i];
            const b = agents[j];
            const seed = startSeed === undefined ? undefined : startSeed + matchup * gamesPerMatchup;
            const match = playBalancedMatch(a, b, gamesPerMatchup, seed);
            matchup++;
            result.matches.push(match);

            const forA: ITournamentRecord = {wins: match.playerOneWins, losses: match.playerTwoWins, draws: match.draws};
            const forB: ITournamentRecord = {wins: match.playerTwoWins, losses: match.playerOneWins, draws: match.draws};
            result.headToHead[a.name][b.name] = forA;
            result.headToHead[b.name][a.name] = forB;
            addRecord(result.standings[a.name], forA);
            addRecord(result.standings[b.name], forB);
            log.info("matchup finished", {matchup, a: a.name, b: b.name, record: `${forA.wins}-${forA.losses}-${forA.draws}`});
        }
    }
    return result;
}

export const recordWinRate = (record: ITournamentRecord): number => {
    const total = record.wins + record.losses + record.draws;
    return total === 0 ? 0 : record.wins / total;
}

/** Agent names, best win rate first. Ties keep entry order. */
export const rankAgents = (result: ITournamentResult): string[] => {
    return [...result.agentNames].sort((x, y) => recordWinRate(result.standings[y]) - recordWinRate(result.standings[x]));
}

export const formatTournament = (result: ITournamentResult): string => {
    const ranked = rankAgents(result);
    const lines = [
        `Tournament Results: ${result.agentNames.length} agents, ${result.gamesPerMatchup} games per matchup`,
        `${"Agent".padEnd(20)}${"Wins".padStart(8)}${"Losses".padStart(8)}${"Draws".padStart(8)}${"Win Rate".padStart(10)}`,
    ];
    for (const name of ranked) {
        const rec = result.standings[name];
        lines.push(`${name.padEnd(20)}${String(rec.wins).padStart(8)}${String(rec.losses).padStart(8)}${String(rec.draws).padStart(8)}${pct(recordWinRate(rec)).padStart(10)}`);
    }
    lines.push("", "Head-to-head (row vs column):");
    lines.push("".padEnd(20) + ranked.map(n => n.slice(0, 10).padStart(12)).join(""));
    for (const row of ranked) {
        const cells = ranked.map(col => {
            if (col === row) { return "-".padStart(12); }
            return pct(recordWinRate(result.headToHead[row][col])).padStart(12);
        });
        lines.push(row.slice(0, 20).padEnd(20) + cells.join(""));
    }
    return lines.join("\n");
}

export { createReplay, replayToJSON, replayFromJSON, replayGame, ReplaySchema, ReplayMetadataSchema, RULES_VERSION } from "./replay";
export type { Replay, ReplayMetadata } from "./replay";
