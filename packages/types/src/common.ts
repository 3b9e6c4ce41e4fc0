export type ErrorResponse = {
  status: "error";
  message: string;
};
