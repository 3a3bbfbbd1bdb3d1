/**
 * Experiment: Invert a Matrix Read from a CSV File
 *
 * Usage
 *   tsx node_examples/invert_csv.ts [matrix.csv] [result.json]
 *
 * What it does
 *  - Loads a square matrix from CSV (comma, semicolon, tab or space separated).
 *  - Inverts it and prints the report plus the LaTeX form of the inverse.
 *  - Optionally writes the result (inverse, determinant, steps) as JSON.
 *
 * Notes
 *  - Defaults to node_examples/data/sample_3x3.csv.
 *  - Bad cells are reported with their 1-based position.
 */

import path from "path";
import { invert } from "../src/core/GaussJordan";
import { isInversionError } from "../src/core/InversionErrors";
import { formatOperationTable, formatResult, toLatex } from "../src/utils/Format";
import { loadMatrixFile, saveResultAsJSON } from "../src/utils/IO";

const input = process.argv[2] ?? path.join(__dirname, "data", "sample_3x3.csv");
const output = process.argv[3];

try {
    const matrix = loadMatrixFile(input);
    console.log(`✅ Loaded ${matrix.length}x${matrix[0].length} matrix from ${input}`);

    const result = invert(matrix, { log: { name: path.basename(input), verbose: true } });
    console.log(formatResult(result));
    console.log(`\n${formatOperationTable(result.log)}`);

    if (result.kind === "success") {
        console.log(`\nLaTeX: ${toLatex(result.inverse)}`);
    }

    if (output) {
        saveResultAsJSON(result, output);
        console.log(`💾 Saved result to ${output}`);
    }
} catch (err) {
    if (isInversionError(err)) {
        console.error(`❌ ${err.code}: ${err.message}`);
        process.exitCode = 1;
    } else {
        throw err;
    }
}
