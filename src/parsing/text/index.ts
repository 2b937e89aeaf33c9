export * from "./vacancyText";
export * from "./statisticText";
export * from "./extractFields";
