import { describe, expect, it } from "vitest";

import { usernameTableFormat } from "./usernameTableFormat.js";

describe("usernameTableFormat", () => {
    const usernames = [
        { value: "maison42", language: "fra", suffix: "42" },
        { value: "casa07", language: "spa", suffix: "07" },
        { value: "Jardinierlongname", language: "fra", suffix: null }
    ] as const;

    it("sorts by username and pads the first column", () => {
        expect(usernameTableFormat(usernames).split("\n")).toEqual([
            "Username           Language",
            "-----------------  --------",
            "Jardinierlongname  French (fra)",
            "casa07             Spanish (spa)",
            "maison42           French (fra)"
        ]);
    });

    it("keeps acceptance order when unsorted", () => {
        const lines = usernameTableFormat(usernames, { sorted: false }).split("\n");
        expect(lines.slice(2).map((line) => line.split(" ")[0])).toEqual(["maison42", "casa07", "Jardinierlongname"]);
    });

    it("renders only the header for an empty list", () => {
        expect(usernameTableFormat([])).toBe("Username  Language\n--------  --------");
    });
});
