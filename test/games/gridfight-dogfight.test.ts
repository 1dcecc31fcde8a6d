/* eslint-disable @typescript-eslint/no-unused-expressions */

import "mocha";
import { expect } from "chai";
import { GridfightGame, getActionCatalog } from "../../src/games";
import type { IDogfightResult, IDogfightTurn, playerid } from "../../src/games";
import { resolvePlays } from "../../src/games/gridfight/dogfight";
import { dogfightPosition } from "./helpers";

const catalog = getActionCatalog();
const PASS = catalog.passIndex;
const W0 = catalog.weaponIndex(0);

const totalDraws = (r: IDogfightResult): number => r.draws[1].length + r.draws[2].length;

/**
 * Player 1 holds 3 and player 2 holds 8 at the center, so player 1 is the
 * underdog. Piles can be overridden per player.
 */
const fight = (piles: Partial<Record<playerid, number[]>>, actions: [playerid, number][]): {g: GridfightGame; result: IDogfightResult} => {
    const state = dogfightPosition([[[1, 1], 3, 8]]);
    const players: playerid[] = [1, 2];
    for (const p of players) {
        const pile = piles[p];
        if (pile !== undefined) {
            state.resources[p].drawPile = [...pile];
            state.resources[p].discard = Array.from({length: 13}, (_, i) => i + 1).filter(c => !pile.includes(c));
        }
    }
    const g = GridfightGame.fromSnapshot(state, 5);
    g.beginDogfight();
    for (const [player, index] of actions) {
        expect(g.applyDogfightTurnAction(player, index)).to.be.true;
    }
    expect(g.isDogfightComplete()).to.be.true;
    return {g, result: g.finishDogfight()};
}

describe("Gridfight: dogfights", () => {
    it ("Both pass: straight to the cards, two draws", () => {
        const {g, result} = fight({1: [9, 1, 2], 2: [1, 2, 3]}, [[1, PASS], [2, PASS]]);
        expect(result.plays).to.deep.equal({1: {kind: "pass"}, 2: {kind: "pass"}});
        // 3 + 9 against 8 + 1
        expect(result.draws).to.deep.equal({1: [9], 2: [1]});
        expect(result.eliminated).to.deep.equal([2]);
        expect(result.winner).to.equal(1);
        expect(totalDraws(result)).to.equal(2);
        const state = g.state();
        expect(state.grid[1][1]).to.deep.equal([{owner: 1, power: 3, hidden: false}]);
        expect(state.resources[1].drawPile).to.deep.equal([1, 2]);
        expect(state.resources[1].discard).to.have.lengthOf(11);
        expect(state.resources[1].discard[10]).to.equal(9);
        expect(state.resources[1].weapons).to.have.lengthOf(4);
    });

    it ("Attack met by a defence cancels out, two draws", () => {
        const {g, result} = fight({}, [[1, W0], [2, catalog.weaponIndex(2)]]);
        expect(result.plays).to.deep.equal({1: {kind: "offense", slot: 0}, 2: {kind: "defense", slot: 2}});
        expect(result.hit).to.be.false;
        expect(totalDraws(result)).to.equal(2);
        // 3 + 1 against 8 + 1
        expect(result.eliminated).to.deep.equal([1]);
        const state = g.state();
        expect(state.resources[1].weapons).to.deep.equal(["K", "Q", "J"]);
        expect(state.resources[2].weapons).to.deep.equal(["A", "K", "J"]);
    });

    it ("An undefended hit ends the fight on one draw", () => {
        const {g, result} = fight({1: [9, 1]}, [[1, W0], [2, PASS]]);
        expect(result.plays).to.deep.equal({1: {kind: "offense", slot: 0}, 2: {kind: "pass"}});
        expect(result.hit).to.be.true;
        expect(result.draws).to.deep.equal({1: [9], 2: []});
        expect(totalDraws(result)).to.equal(1);
        expect(result.eliminated).to.deep.equal([2]);
        expect(result.winner).to.equal(1);
        expect(result.outcome).to.equal("single");
        expect(g.state().resources[2].drawPile).to.have.lengthOf(13);
    });

    it ("Seven is enough to hit", () => {
        const {result} = fight({1: [7, 1]}, [[1, W0], [2, PASS]]);
        expect(result.hit).to.be.true;
        expect(result.eliminated).to.deep.equal([2]);
    });

    it ("An undefended miss falls through to the cards, three draws", () => {
        const {result} = fight({1: [6, 5, 1]}, [[1, W0], [2, PASS]]);
        expect(result.hit).to.be.false;
        // miss on 6, then 3 + 5 against 8 + 1
        expect(result.draws).to.deep.equal({1: [6, 5], 2: [1]});
        expect(totalDraws(result)).to.equal(3);
        expect(result.eliminated).to.deep.equal([1]);
        expect(result.winner).to.equal(2);
    });

    it ("The favourite can attack after a pass", () => {
        const {g, result} = fight({2: [10, 1]}, [[1, PASS], [2, catalog.weaponIndex(1)], [1, PASS]]);
        expect(result.plays).to.deep.equal({1: {kind: "pass"}, 2: {kind: "offense", slot: 1}});
        expect(result.hit).to.be.true;
        expect(result.draws).to.deep.equal({1: [], 2: [10]});
        expect(result.eliminated).to.deep.equal([1]);
        expect(g.history.slice(-3)).to.deep.equal([[1, PASS], [2, 82], [1, PASS]]);
    });

    it ("The underdog may answer a late attack", () => {
        const {g, result} = fight({}, [[1, PASS], [2, W0], [1, catalog.weaponIndex(3)]]);
        expect(result.plays).to.deep.equal({1: {kind: "defense", slot: 3}, 2: {kind: "offense", slot: 0}});
        expect(totalDraws(result)).to.equal(2);
        expect(g.state().resources[1].weapons).to.deep.equal(["A", "K", "Q"]);
    });

    it ("Tracks whose attack is pending", () => {
        const state = dogfightPosition([[[1, 1], 3, 8]]);
        const g = GridfightGame.fromSnapshot(state, 5);
        g.beginDogfight();
        expect(g.getDogfightContext().offense).to.be.undefined;
        g.applyDogfightTurnAction(1, PASS);
        expect(g.getDogfightActor()).to.equal(2);
        expect(g.getDogfightContext().offense).to.be.undefined;
        g.applyDogfightTurnAction(2, W0);
        expect(g.getDogfightContext().offense).to.equal(2);
        expect(g.getDogfightActor()).to.equal(1);
        expect(g.isDogfightComplete()).to.be.false;
    });

    it ("Equal totals eliminate both units", () => {
        const state = dogfightPosition([[[1, 1], 5, 5]]);
        const g = GridfightGame.fromSnapshot(state, 5);
        g.beginDogfight();
        g.applyDogfightTurnAction(2, PASS);
        g.applyDogfightTurnAction(1, PASS);
        const result = g.finishDogfight();
        expect(result.eliminated).to.deep.equal([1, 2]);
        expect(result.outcome).to.equal("double");
        expect(result.winner).to.be.undefined;
        expect(g.state().grid[1][1]).to.deep.equal([]);
        expect(g.getWinner()).to.equal("draw");
    });

    it ("Refills an empty pile from the discards", () => {
        const state = dogfightPosition([[[1, 1], 3, 8]]);
        state.resources[1].discard = state.resources[1].drawPile;
        state.resources[1].drawPile = [];
        const g = GridfightGame.fromSnapshot(state, 5);
        g.beginDogfight();
        g.applyDogfightTurnAction(1, PASS);
        g.applyDogfightTurnAction(2, PASS);
        const result = g.finishDogfight();
        const after = g.state().resources[1];
        expect(after.drawPile).to.have.lengthOf(12);
        expect(after.discard).to.deep.equal(result.draws[1]);
        expect([...after.drawPile, ...after.discard].sort((a, b) => a - b)).to.deep.equal([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
    });

    it ("Resolves roles from turn order", () => {
        const base: IDogfightTurn = {position: [1, 1], underdog: 2, other: 1, actor: 2, complete: true};
        expect(resolvePlays({...base, first: W0, second: PASS}, catalog)).to.deep.equal({1: {kind: "pass"}, 2: {kind: "offense", slot: 0}});
        expect(resolvePlays({...base, first: PASS, second: 83, third: 84}, catalog)).to.deep.equal({1: {kind: "offense", slot: 2}, 2: {kind: "defense", slot: 3}});
        expect(() => resolvePlays({...base, complete: false}, catalog)).to.throw();
    });
});
