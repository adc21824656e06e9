export const colors = {
  primary: '#7AA2F7',      // Soft blue
  primaryLight: '#B4C7FB',
  success: '#9ECE6A',      // Green
  error: '#F7768E',        // Red
  warning: '#E0AF68',      // Amber, for lines past the width
  muted: '#A1A1AA',
  mutedDark: '#3F3F46',
  accent: '#7DCFFF',       // Cyan
  comment: '#565F89',
  white: '#FAFAFA',
  info: '#93C5FD',
} as const;

export const dimensions = {
  debugLines: 8,
} as const;
