/* eslint-disable @typescript-eslint/no-unused-expressions */

import "mocha";
import { expect } from "chai";
import { GridfightGame, getActionCatalog, copyState } from "../../src/games";

describe("Gridfight: action catalog", () => {
    const catalog = getActionCatalog();

    it ("Has 86 actions in a fixed order", () => {
        expect(catalog.size()).to.equal(86);
        expect(catalog.get(0)).to.deep.equal({type: "place", power: 2, row: 0, col: 0});
        expect(catalog.get(13)).to.deep.equal({type: "place", power: 3, row: 1, col: 1});
        expect(catalog.get(80)).to.deep.equal({type: "place", power: 10, row: 2, col: 2});
        expect(catalog.get(81)).to.deep.equal({type: "weapon", slot: 0});
        expect(catalog.get(84)).to.deep.equal({type: "weapon", slot: 3});
        expect(catalog.get(85)).to.deep.equal({type: "pass"});
    });
    it ("Is shared and frozen", () => {
        expect(getActionCatalog()).to.equal(catalog);
        expect(Object.isFrozen(catalog.get(0))).to.be.true;
    });
    it ("Looks up indices", () => {
        expect(catalog.placeIndex(6, 1, 1)).to.equal(40);
        expect(catalog.weaponIndex(2)).to.equal(83);
        expect(catalog.passIndex).to.equal(85);
        expect(catalog.indexOf({type: "weapon", slot: 4})).to.equal(-1);
    });
    it ("Rejects out-of-range indices", () => {
        expect(() => catalog.get(86)).to.throw(RangeError);
        expect(() => catalog.get(-1)).to.throw(RangeError);
        expect(() => catalog.get(1.5)).to.throw(RangeError);
    });
    it ("Describes actions", () => {
        expect(catalog.describe(0)).to.equal("place 2@a3");
        expect(catalog.describe(80)).to.equal("place 10@c1");
        expect(catalog.describe(82)).to.equal("weapon[1]");
        expect(catalog.describe(85)).to.equal("pass");
    });
    it ("Only placements are legal at the start", () => {
        const g = new GridfightGame(1);
        const mask = g.getLegalMask();
        expect(mask).to.have.lengthOf(86);
        expect(mask.slice(0, 81).every(m => m)).to.be.true;
        expect(mask.slice(81).some(m => m)).to.be.false;
    });
    it ("Contesting is legal, re-occupying is not", () => {
        const g = new GridfightGame(1);
        g.applyAction(catalog.placeIndex(5, 1, 1));
        // player 2 may contest the center
        expect(g.getLegalActions(2)).to.include(catalog.placeIndex(7, 1, 1));
        // player 1 may not go back there, and has no 5 left
        const mine = g.getLegalActions(1);
        expect(mine).to.not.include(catalog.placeIndex(7, 1, 1));
        expect(mine).to.not.include(catalog.placeIndex(5, 0, 0));
        expect(mine).to.have.lengthOf(64);
    });
    it ("No placements once dogfights start; weapons follow the count", () => {
        const g = new GridfightGame(1);
        const state = copyState(g.state());
        state.phase = "dogfights";
        state.resources[1].weapons = ["A", "K"];
        const legal = catalog.legalIndices(state, 1);
        expect(legal).to.deep.equal([81, 82, 85]);
        const mask = catalog.legalMask(state, 2);
        expect(mask).to.have.lengthOf(86);
        expect(mask.slice(0, 81).some(m => m)).to.be.false;
        expect(catalog.legalIndices(state, 2)).to.deep.equal([81, 82, 83, 84, 85]);
    });
    it ("Nothing is legal once the game has ended", () => {
        const state = copyState(new GridfightGame(1).state());
        state.phase = "ended";
        expect(catalog.legalIndices(state, 1)).to.deep.equal([]);
    });
});
