export const MESSAGE_INVALID_COMMAND_FORMAT = "Invalid command format! \n%s";
export const MESSAGE_UNKNOWN_COMMAND = "Unknown command";
export const MESSAGE_INVALID_TF_ANSWER =
  "The answer of a true/false question must be true or false";
