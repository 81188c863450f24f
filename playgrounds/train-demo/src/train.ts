import { cached } from "@memo-cache/core";
import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";

export const trainInputSchema = z.object({
    adataPath: z.string().min(1).describe("Path to the annotated dataset"),
    nHidden: z.number().int().positive().optional().describe("Hidden layer width"),
});

export type TrainInput = z.infer<typeof trainInputSchema>;

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Pretend to train a model; writes weights into outputModelDir
 */
export const train = cached({
    name: "train",
    parameters: [{ name: "adataPath" }, { name: "nHidden", default: 128 }],
    outputDirs: ["outputModelDir"],
    inputSchema: trainInputSchema,
    fn: async (input: TrainInput, dirs) => {
        const nHidden = input.nHidden ?? 128;
        await sleep(2000);
        const weights = Array.from({ length: nHidden }, (_, i) => Math.sin(i + input.adataPath.length));
        await fs.writeFile(path.join(dirs.outputModelDir, "weights.json"), JSON.stringify(weights));
        return { nHidden, loss: weights.reduce((a, b) => a + Math.abs(b), 0) / nHidden };
    },
});
