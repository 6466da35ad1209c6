export type AppConfig = {
  title: string;
  caption: string;
  shuffleQuestions: boolean;
  keyboardShortcuts: boolean;
  showExplanation: boolean;
  navigatorColumns: number;
  /** Clock refresh period; values above 1000 are capped to 1000. */
  timerTickMs: number;
};

export const DEFAULT_CONFIG: AppConfig = {
  title: "MRCP Examination Practice Platform",
  caption: "Test your medical knowledge with these clinically relevant questions",
  shuffleQuestions: true,
  keyboardShortcuts: true,
  showExplanation: true,
  navigatorColumns: 4,
  timerTickMs: 1000,
};
