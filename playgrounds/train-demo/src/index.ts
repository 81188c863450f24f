import { setCacheRoot, setLogLevel } from "@memo-cache/core";
import { train } from "./train.js";

setCacheRoot(process.env.MEMO_CACHE_DIR ?? ".memo-cache");
setLogLevel("debug");

async function main(): Promise<void> {
    for (const attempt of ["slow", "fast"]) {
        const started = Date.now();
        const result = await train({ adataPath: "path/to/adata" });
        console.log(
            `${attempt}: hit=${result.hit} loss=${result.value?.loss.toFixed(4)} ` +
                `model=${result.outputDirs.outputModelDir} (${Date.now() - started}ms)`
        );
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
