export const spinnerConfig = {
  frames: "⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏",
  interval: 80,
} as const

export const chartConfig = {
  bar: "█",
  width: 40,
  labelWidth: 24,
} as const
