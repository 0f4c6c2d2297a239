// Prompt builders for the planning flows

import type { Activity, ItineraryDocument, PlannedTrip, TripRequest } from './itinerary.js';
import { HOTEL_PRICE_TOOL_NAME, WEATHER_TOOL_NAME } from '../tools/index.js';

const ITINERARY_SHAPE = `{
    "plan": [
        {
            "day": <integer>,
            "date": "<string YYYY-MM-DD>",
            "theme": "<string>",
            "activities": [
                {
                    "time": "<string>",
                    "description": "<string>",
                    "location_name": "<string>",
                    "latitude": <float>,
                    "longitude": <float>
                }
            ]
        }
    ],
    "cost_breakdown": {
        "accommodation_estimate_inr": <integer>,
        "transport_estimate_inr": <integer>,
        "activities_estimate_inr": <integer>,
        "food_estimate_inr": <integer>,
        "total_estimate_inr": <integer>
    }
}`;

function requestLines(request: TripRequest): string {
  const lines = [
    `- Source: ${request.source}`,
    `- Destination: ${request.destination}`,
    `- Total Budget: ${request.budget} INR`,
    `- Start Date: ${request.start_date}`,
    `- Return Date: ${request.return_date}`,
    `- Interests: ${request.interests.join(', ')}`,
  ];
  if (request.transport_mode) lines.push(`- Preferred Transport: ${request.transport_mode}`);
  if (request.additional_reqs) lines.push(`- Additional Requirements: ${request.additional_reqs}`);
  lines.push(`- Itinerary Language: ${request.language}`);
  return lines.join('\n');
}

export function buildPlanPrompt(request: TripRequest): string {
  return `You are an expert travel agent. Create a realistic itinerary based on user input and real-world data.

**IMPORTANT: Your response MUST be ONLY a valid JSON object. Do not include any code.**

**Step 1: Get Real-World Data**
You MUST first call the \`${HOTEL_PRICE_TOOL_NAME}\` tool for the user's destination: ${request.destination}.
You may call \`${WEATHER_TOOL_NAME}\` if current conditions matter for the plan.

**Step 2: Adhere to the Budget**
Once you have the real hotel price, create a complete itinerary that fits within the user's total budget of ${request.budget} INR. If the budget is too low for the requested duration, you MUST reduce the number of days or suggest cheaper alternatives. The 'total_estimate_inr' in your final JSON must not exceed the user's budget.

**Step 3: Generate the Final Output**
After all calculations are done, your entire response MUST be ONLY a single, valid JSON object with no conversational text.
***CRITICAL LANGUAGE INSTRUCTION: All text values within the JSON, such as 'theme' and 'description', MUST be written in the following language: ${request.language}.***

The JSON object MUST strictly follow this exact structure:
${ITINERARY_SHAPE}

**User Request for this task:**
${requestLines(request)}`;
}

export function buildRegeneratePrompt(original: PlannedTrip, changeRequest: string): string {
  return `Modify this travel itinerary based on the user's request: "${changeRequest}"

Original itinerary: ${JSON.stringify(original.itinerary, null, 2)}

Return the COMPLETE modified itinerary as valid JSON with the same structure.
IMPORTANT: Keep the same structure including latitude and longitude for each activity.
The total_estimate_inr must not exceed the budget of ${original.request.budget} INR.
Language: ${original.request.language}`;
}

export function buildBudgetRepairPrompt(request: TripRequest, itinerary: ItineraryDocument): string {
  return `The itinerary below has a total_estimate_inr of ${itinerary.cost_breakdown.total_estimate_inr} INR, which exceeds the traveller's budget of ${request.budget} INR.

Revise it so the total_estimate_inr is at most ${request.budget} INR. Reduce the number of days, choose cheaper stays or swap paid activities for free ones as needed.
Return the COMPLETE revised itinerary as a single valid JSON object with exactly the same structure, written in ${request.language}.

Itinerary: ${JSON.stringify(itinerary, null, 2)}`;
}

export function buildWeatherAdjustPrompt(destination: string, activities: Activity[]): string {
  return `You are a smart travel assistant. Your task is to adjust a user's plan for today based on the current weather.

1.  **MUST call the \`${WEATHER_TOOL_NAME}\` tool for the destination: ${destination}.**
2.  Based on the weather condition (e.g., "Rain", "Clear", "Clouds") and temperature, review the following list of activities.
3.  If the weather is bad (e.g., "Rain", "Thunderstorm", "Extreme heat over 35°C"), you MUST replace outdoor activities with suitable indoor alternatives (e.g., museums, indoor markets, cinemas, malls, art galleries).
4.  If the weather is good, you can keep the existing activities or suggest even better outdoor options.
5.  Your final output MUST be only a valid JSON array of the adjusted activities, keeping the original structure. Do not add any conversational text.

Original activities for today:
${JSON.stringify(activities, null, 2)}`;
}
