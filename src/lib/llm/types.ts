export type OrganizeOptions = {
  temperature?: number;
};

/** Turns a prompt into the model's raw text answer. Failures are thrown. */
export interface TextOrganizer {
  readonly provider: string;
  readonly model: string;
  organize(prompt: string, options?: OrganizeOptions): Promise<string>;
}
