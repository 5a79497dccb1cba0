import { select } from "@inquirer/prompts";
import type { SourceChoicePresenter, SourceChoiceRequest } from "../media/capabilities";
import { buildSourceOptions } from "../media/source-choice";
import type { MediaSource } from "../media/types";
import { promptOrNull } from "./prompts";

const UNTITLED_MESSAGE = "Select media";

export class PromptSourceChoicePresenter implements SourceChoicePresenter {
  presentSourceChoice(request: SourceChoiceRequest): Promise<MediaSource | null> {
    const { title, options } = buildSourceOptions(request);
    return promptOrNull(() =>
      select<MediaSource>({
        message: title ?? UNTITLED_MESSAGE,
        choices: options.map((option) => ({ name: option.label, value: option.source })),
      }),
    );
  }
}
