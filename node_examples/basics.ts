/**
 * First Experiment: Inverting a 2x2 Matrix Step by Step
 *
 * This script inverts A = [[4, 7], [2, 6]] with Gauss-Jordan elimination and
 * prints every elementary row operation the engine applied.
 *
 * Steps:
 *  1. Build the engine with the audit preset (debug logging on).
 *  2. Invert A and branch on the tagged result.
 *  3. Print the inverse, the determinant and the operation table.
 *  4. Replay the log against [A | I] and confirm it lands on [I | A⁻¹].
 *  5. Show that a singular matrix comes back as a result, not an exception.
 *
 * Pipeline Overview:
 *
 *        A ──► [A | I] ──► pivot / swap / scale / eliminate ──► [I | A⁻¹]
 *                                   │
 *                                   ▼
 *                             Operation Log ──► replay
 */

import { GaussJordanEngine } from "../src/core/GaussJordan";
import { replayOperations } from "../src/core/OperationLog";
import { Matrix } from "../src/core/Matrix";
import { AuditPreset } from "../src/config/Presets";
import { formatAugmented, formatOperationTable, formatResult, toLatex } from "../src/utils/Format";

const A = [
    [4, 7],
    [2, 6],
];

const engine = new GaussJordanEngine(AuditPreset);

console.log(`⚙️ Inverting ${A.length}x${A.length} matrix...`);
const result = engine.invert(A);
console.log(formatResult(result));

if (result.kind === "success") {
    console.log(`\n📝 Elementary row operations:`);
    console.log(formatOperationTable(result.log));

    console.log(`\n🔁 Replaying ${result.log.length} operations on [A | I]:`);
    const replayed = replayOperations(A, result.log);
    console.log(formatAugmented(replayed));
    console.log(`Left half is identity: ${Matrix.isIdentity(replayed.extractLeftHalf())}`);

    console.log(`\nLaTeX: ${toLatex(result.inverse)}`);
}

const S = [
    [1, 2],
    [2, 4],
];
const singular = engine.invert(S);
console.log(`\n${formatResult(singular)}`);

console.log(`✅ Done.`);
