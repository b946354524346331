import type { ModelProvisioner, Translator } from "@srt-realign/core";
import { runCommand } from "./run-command";

// argostranslate exposes these calls only through its Python API
const TRANSLATE_SCRIPT = [
  "import sys",
  "from argostranslate import translate",
  "sys.stdout.write(translate.translate(sys.stdin.read(), sys.argv[1], sys.argv[2]))",
].join("\n");

const IS_INSTALLED_SCRIPT = [
  "import sys",
  "from argostranslate import package",
  "pairs = [(p.from_code, p.to_code) for p in package.get_installed_packages()]",
  "sys.exit(0 if (sys.argv[1], sys.argv[2]) in pairs else 3)",
].join("\n");

const INSTALL_SCRIPT = [
  "import sys",
  "from argostranslate import package",
  "package.install_from_path(sys.argv[1])",
].join("\n");

const NOT_INSTALLED_EXIT_CODE = 3;

// stdin/stdout follow the locale otherwise, which breaks on non-UTF-8 consoles
const pythonEnv = (): NodeJS.ProcessEnv => ({
  ...process.env,
  PYTHONIOENCODING: "utf-8",
});

export interface ArgosOptions {
  /** Interpreter with `argostranslate` installed. */
  python?: string;
}

export const argosModelUrl = (sourceLanguage: string, targetLanguage: string) =>
  `https://argos-net.com/v1/translate-${sourceLanguage}_${targetLanguage}-1_9.argosmodel`;

export const createArgosTranslator = (
  options: ArgosOptions = {}
): Translator => {
  const { python = "python3" } = options;

  return async (text, context) => {
    if (!text.trim()) {
      return "";
    }

    const { stdout } = await runCommand(
      python,
      ["-c", TRANSLATE_SCRIPT, context.sourceLanguage, context.targetLanguage],
      { input: text, env: pythonEnv() }
    );
    return stdout.trim();
  };
};

export const createArgosProvisioner = (
  options: ArgosOptions = {}
): ModelProvisioner => {
  const { python = "python3" } = options;

  return {
    isInstalled: async (sourceLanguage, targetLanguage) => {
      const { exitCode } = await runCommand(
        python,
        ["-c", IS_INSTALLED_SCRIPT, sourceLanguage, targetLanguage],
        { allowedExitCodes: [0, NOT_INSTALLED_EXIT_CODE], env: pythonEnv() }
      );
      return exitCode === 0;
    },
    installFrom: async (modelPath) => {
      await runCommand(python, ["-c", INSTALL_SCRIPT, modelPath], {
        env: pythonEnv(),
      });
    },
  };
};
