/* eslint-disable @typescript-eslint/no-unused-expressions */

import "mocha";
import { expect } from "chai";
import type { GridfightSnapshot, playerid } from "../../src/games";
import { AIBase, RandomAI } from "../../src/ais";
import { playGame, playMatch, playBalancedMatch, matchRates, formatMatch, playTournament, rankAgents, recordWinRate, formatTournament } from "../../src/harness";

class FirstLegalAI extends AIBase {
    public readonly name: string;
    public started: [playerid, number][] = [];
    public ended: (playerid | "draw")[] = [];
    public finalTurn?: number;

    constructor(name = "First") {
        super();
        this.name = name;
    }
    public selectAction(_snapshot: GridfightSnapshot, legal: readonly number[]): number {
        return legal[0];
    }
    public onGameStart(player: playerid, seed: number): void {
        this.started.push([player, seed]);
    }
    public onGameEnd(snapshot: GridfightSnapshot, outcome: playerid | "draw"): void {
        this.finalTurn = snapshot.turn;
        this.ended.push(outcome);
    }
}

class OffListAI extends AIBase {
    public readonly name = "OffList";
    public selectAction(): number {
        return 85;
    }
}

describe("Harness", () => {
    it ("Plays a game and reports it", () => {
        const one = new FirstLegalAI("A");
        const two = new FirstLegalAI("B");
        const result = playGame(one, two, 42);
        expect(result.winner).to.equal(1);
        expect(result.turns).to.equal(18);
        expect(result.seed).to.equal(42);
        expect(result.playerOneAgent).to.equal("A");
        expect(result.playerTwoAgent).to.equal("B");
        expect(result.history).to.have.lengthOf(28);
        expect(result.history[0]).to.deep.equal([1, 0]);
        expect(result.history[18]).to.deep.equal([2, 81]);
        expect(one.started).to.deep.equal([[1, 42]]);
        expect(two.started).to.deep.equal([[2, 42]]);
        expect(one.ended).to.deep.equal([1]);
        expect(two.ended).to.deep.equal([1]);
        expect(one.finalTurn).to.equal(18);
    });

    it ("Rejects an agent that picks an action it was not offered", () => {
        expect(() => playGame(new OffListAI(), new RandomAI(1), 1)).to.throw(/OffList/);
    });

    it ("Plays a match with counting seeds", () => {
        const match = playMatch(new FirstLegalAI("A"), new FirstLegalAI("B"), 3, 42);
        expect(match.numGames).to.equal(3);
        expect(match.gameResults.map(r => r.seed)).to.deep.equal([42, 43, 44]);
        expect(match.gameResults.map(r => r.winner)).to.deep.equal([1, 2, 1]);
        expect(match.playerOneWins).to.equal(2);
        expect(match.playerTwoWins).to.equal(1);
        expect(match.draws).to.equal(0);
        expect(matchRates(match)).to.deep.equal({playerOne: 2 / 3, playerTwo: 1 / 3, draw: 0});
        expect(formatMatch(match)).to.equal([
            "Match Results: A vs B",
            "Games: 3",
            "P1 Wins: 2 (66.7%)",
            "P2 Wins: 1 (33.3%)",
            "Draws: 0 (0.0%)",
        ].join("\n"));
    });

    it ("Balanced matches swap seats and count from the first agent's side", () => {
        const a = new FirstLegalAI("A");
        const b = new FirstLegalAI("B");
        const match = playBalancedMatch(a, b, 4, 42);
        expect(match.gameResults.map(r => r.playerOneAgent)).to.deep.equal(["A", "A", "B", "B"]);
        expect(match.gameResults.map(r => r.seed)).to.deep.equal([42, 43, 44, 45]);
        expect(match.gameResults.map(r => r.winner)).to.deep.equal([1, 2, 1, 1]);
        expect(match.playerOneAgent).to.equal("A");
        expect(match.playerOneWins).to.equal(1);
        expect(match.playerTwoWins).to.equal(3);
        expect(match.draws).to.equal(0);
        expect(a.started).to.deep.equal([[1, 42], [1, 43], [2, 44], [2, 45]]);
    });

    it ("Balanced matches need an even game count", () => {
        expect(() => playBalancedMatch(new RandomAI(1), new RandomAI(2), 3, 1)).to.throw(RangeError);
    });

    it ("Empty matches have zero rates", () => {
        const match = playMatch(new RandomAI(1), new RandomAI(2), 0);
        expect(matchRates(match)).to.deep.equal({playerOne: 0, playerTwo: 0, draw: 0});
    });

    it ("Runs a round robin with both seats for every pair", () => {
        const agents = [new FirstLegalAI("A"), new FirstLegalAI("B"), new FirstLegalAI("C")];
        const result = playTournament(agents, 2, 42);
        expect(result.matches.map(m => [m.playerOneAgent, m.playerTwoAgent])).to.deep.equal([["A", "B"], ["A", "C"], ["B", "C"]]);
        expect(result.matches.flatMap(m => m.gameResults.map(r => r.seed))).to.deep.equal([42, 43, 44, 45, 46, 47]);
        expect(result.matches.flatMap(m => m.gameResults.map(r => r.winner))).to.deep.equal([1, 2, 1, 1, 1, "draw"]);
        expect(result.standings).to.deep.equal({
            A: {wins: 3, losses: 1, draws: 0},
            B: {wins: 1, losses: 2, draws: 1},
            C: {wins: 1, losses: 2, draws: 1},
        });
        expect(result.headToHead.A.B).to.deep.equal({wins: 2, losses: 0, draws: 0});
        expect(result.headToHead.B.A).to.deep.equal({wins: 0, losses: 2, draws: 0});
        expect(result.headToHead.A.C).to.deep.equal({wins: 1, losses: 1, draws: 0});
        expect(result.headToHead.C.B).to.deep.equal({wins: 0, losses: 1, draws: 1});
        expect(recordWinRate(result.standings.A)).to.equal(0.75);
        expect(recordWinRate({wins: 0, losses: 0, draws: 0})).to.equal(0);
        expect(rankAgents(result)).to.deep.equal(["A", "B", "C"]);
    });

    it ("Formats standings by win rate with a head-to-head table", () => {
        const agents = [new FirstLegalAI("C"), new FirstLegalAI("B"), new FirstLegalAI("A")];
        // same seeds and seats as above with the names reversed, so "C" leads
        const result = playTournament(agents, 2, 42);
        expect(rankAgents(result)).to.deep.equal(["C", "B", "A"]);
        const lines = formatTournament(result).split("\n");
        expect(lines).to.deep.equal([
            "Tournament Results: 3 agents, 2 games per matchup",
            "Agent                   Wins  Losses   Draws  Win Rate",
            "C                          3       1       0     75.0%",
            "B                          1       2       1     25.0%",
            "A                          1       2       1     25.0%",
            "",
            "Head-to-head (row vs column):",
            "                               C           B           A",
            "C                              -      100.0%       50.0%",
            "B                           0.0%           -       50.0%",
            "A                          50.0%        0.0%           -",
        ]);
    });

    it ("Tournament standings add up across mixed agents", () => {
        const result = playTournament([new RandomAI(3, "R1"), new FirstLegalAI("F"), new RandomAI(4, "R2")], 4, 100);
        expect(result.matches).to.have.lengthOf(3);
        for (const name of result.agentNames) {
            const rec = result.standings[name];
            expect(rec.wins + rec.losses + rec.draws).to.equal(8);
        }
        const f = result.headToHead.F.R1;
        const r = result.headToHead.R1.F;
        expect([r.wins, r.losses, r.draws]).to.deep.equal([f.losses, f.wins, f.draws]);
    });

    it ("Tournaments reject duplicate names and odd matchups", () => {
        expect(() => playTournament([new RandomAI(1), new RandomAI(2)], 2, 1)).to.throw(/unique names/);
        expect(() => playTournament([new RandomAI(1, "X"), new RandomAI(2, "Y")], 3, 1)).to.throw(RangeError);
    });
});
