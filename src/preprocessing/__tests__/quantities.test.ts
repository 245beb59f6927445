import { describe, it, expect } from "vitest";
import { hasNumber, hasUnit } from "../quantities";

describe("hasNumber", () => {
    it("finds integers, decimals and scientific notation", () => {
        expect(hasNumber("Cycled 500 times.")).toBe(true);
        expect(hasNumber("A fade of 0.5 percent per cycle.")).toBe(true);
        expect(hasNumber("Diffusivity reached 1.5e-3 overall.")).toBe(true);
    });

    it("ignores citation markers and formula indices", () => {
        expect(hasNumber("Its capacity retention is high [1].")).toBe(false);
        expect(hasNumber("Prior work [3-7] agrees.")).toBe(false);
        expect(hasNumber("The LiFePO_{4} cathode is stable.")).toBe(false);
        expect(hasNumber("The LiFePO4 cathode is stable.")).toBe(false);
    });
});

describe("hasUnit", () => {
    it("finds a number followed by a unit", () => {
        expect(hasUnit("Cells were cycled between 2.5 and 4.2 V.")).toBe(true);
        expect(hasUnit("Annealed at 700 °C in argon.")).toBe(true);
        expect(hasUnit("Annealed at 700°C in argon.")).toBe(true);
        expect(hasUnit("The cathode delivered 160 mAh/g at low rate.")).toBe(true);
        expect(hasUnit("A 10 mm pellet was pressed.")).toBe(true);
        expect(hasUnit("Held for 10 h.")).toBe(true);
    });

    it("needs the unit to stand on its own", () => {
        expect(hasUnit("Capacity exceeded 95 percent after 500 cycles.")).toBe(false);
        expect(hasUnit("We tested 10 samples.")).toBe(false);
    });

    it("needs a number before the unit", () => {
        expect(hasUnit("A sample was measured in mV ranges.")).toBe(false);
    });
});
