export const GARDEN_DESCRIPTION = "Quality garden tools. ".repeat(6).trim();

export const GARDEN_PAGE = [
  "<!doctype html>",
  "<html>",
  "<head>",
  "<title>Garden Tools and Supplies for Every Season</title>",
  `<meta name="description" content="${GARDEN_DESCRIPTION}">`,
  "</head>",
  "<body>",
  "<h1>Garden Tools</h1>",
  "<h2>Shovels</h2>",
  "<p>Garden shovels and garden rakes.</p>",
  '<img src="shovel.png" alt="Shovel">',
  '<a href="/shop">Shop</a>',
  '<a href="https://partner.org/">Partner</a>',
  "</body>",
  "</html>",
].join("\n");

export const SHORT_PAGE = "<title>Short</title>";
