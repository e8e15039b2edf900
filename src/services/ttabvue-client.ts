import { AxiosInstance } from "axios";
import config from "../config/config";
import { createHttpClient } from "./http-client";

export interface ProceedingSource {
  fetchProceeding(proceedingNumber: string, proceedingType: string): Promise<string>;
  fetchPartySearch(partyName: string): Promise<string>;
  fetchPage(url: string): Promise<string>;
}

export class TtabvueClient implements ProceedingSource {
  private http: AxiosInstance;

  constructor(http?: AxiosInstance) {
    this.http =
      http ??
      createHttpClient({
        service: "TTABVue",
        baseURL: config.get("ttabvueBaseUrl"),
        timeout: config.get("requestTimeoutMs"),
      });
  }

  public async fetchProceeding(
    proceedingNumber: string,
    proceedingType: string
  ): Promise<string> {
    const response = await this.http.get<string>("", {
      params: { pno: proceedingNumber, pty: proceedingType },
      responseType: "text",
    });
    return response.data;
  }

  public async fetchPartySearch(partyName: string): Promise<string> {
    const response = await this.http.get<string>("", {
      params: { qt: "adv", pn: partyName, procstatus: "All" },
      responseType: "text",
    });
    return response.data;
  }

  /** Any TTABVue results page, by absolute URL. */
  public async fetchPage(url: string): Promise<string> {
    const response = await this.http.get<string>(url, { responseType: "text" });
    return response.data;
  }
}
