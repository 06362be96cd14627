export interface ApiResponse<T = unknown> {
  responseStatus: "success" | "error";
  message: string;
  data: T;
}
