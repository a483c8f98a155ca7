const RED = "\u001b[91m";
const BLUE = "\u001b[94m";
const BOLD = "\u001b[1m";
const RESET = "\u001b[0m";

export const USER_LABEL = `${BOLD}${RED}User${RESET}`;
export const BOT_LABEL = `${BOLD}${BLUE}Bot${RESET}`;
