import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { main } from "./main";

const code = await main(process.env, new StdioServerTransport());
if (code !== 0) process.exit(code);
