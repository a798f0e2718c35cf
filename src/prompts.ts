import inquirer from "inquirer";
import type { CastDevice, DeviceCandidate } from "./types.js";

export const describeCandidate = (candidate: DeviceCandidate): string =>
  `${candidate.device.displayName} (${candidate.device.address}:${candidate.device.port})`;

export const promptForDevice = async (candidates: DeviceCandidate[]): Promise<CastDevice> => {
  const { index } = await inquirer.prompt<{ index: number }>([
    {
      type: "list",
      name: "index",
      message: "Several cast devices were found. Which one should receive the stream?",
      choices: candidates.map((candidate, position) => ({
        name: describeCandidate(candidate),
        value: position,
      })),
    },
  ]);

  return candidates[index].device;
};
