// src/components/constants.ts

// Decoration banner: "[ ───── LABEL ───── ]"
export const DECORATION_WIDTH = 25;
export const DECORATION = {
  OPEN: '[',
  CLOSE: ']',
  DASH: '─',
};

// Tree connectors for nested mappings
export const TREE = {
  BRANCH: '├─ ',
  LAST: '└─ ',
  PIPE: '│  ',
  SPACE: '   ',
};

// Message body and trace glyphs
export const BULLET = '• ';
export const BODY_SEPARATOR = '\n• ';
export const FRAME_ARROW = '→';
export const CYCLE_MARKER = '<cycle>';
export const DEFAULT_ASSERT_MESSAGE = 'Assertion Failed!';

// Config file name (looked up in cwd unless TRACEBOX_CONFIG is set)
export const CONFIG_FILE = 'tracebox.config.json';

// Environment variable names
export const ENV_CONFIG = 'TRACEBOX_CONFIG';
export const ENV_CONTAINER_STYLE = 'TRACEBOX_CONTAINER_STYLE';
export const ENV_TRACE_MODE = 'TRACEBOX_TRACE_MODE';
export const ENV_TAB_WIDTH = 'TRACEBOX_TAB_WIDTH';
export const ENV_SCRIPT_ROOT = 'TRACEBOX_SCRIPT_ROOT';
export const ENV_NAME_PREFIX = 'TRACEBOX_NAME_PREFIX';
export const ENV_TRACE_SKIP = 'TRACEBOX_TRACE_SKIP';
export const ENV_TRACE_IGNORE = 'TRACEBOX_TRACE_IGNORE';

// Host frames dropped from captured Node stacks
export const DEFAULT_TRACE_IGNORE = ['node:internal/**', '**/node_modules/**'];

// Captured stack depth; the default of 10 is mostly eaten by our own frames
export const STACK_TRACE_LIMIT = 50;
